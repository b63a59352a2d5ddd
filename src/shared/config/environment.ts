import { z } from 'zod';

const environmentSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FRAME_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

let cached: Environment | undefined;

export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = environmentSchema.safeParse(source);

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  return parsed.data;
}

export function getEnvironment(): Environment {
  cached ??= loadEnvironment();
  return cached;
}
