export const PLAY_MODES = ['loop', 'once', 'pingpong'] as const;

export type PlayMode = (typeof PLAY_MODES)[number];

export const isPlayMode = (value: unknown): value is PlayMode =>
  typeof value === 'string' && (PLAY_MODES as readonly string[]).includes(value);
