import type { AnimationConfigPayload } from '../dto/animation-config.dto.js';

export class CreateFramePlayerCommand {
  public readonly payload: AnimationConfigPayload;

  public constructor(payload: AnimationConfigPayload) {
    this.payload = payload;
  }
}
