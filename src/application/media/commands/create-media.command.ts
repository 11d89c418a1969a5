import type { CreateMediaInput } from '../dto/create-media.dto.js';

export class CreateMediaCommand {
  public readonly payload: CreateMediaInput;

  public constructor(payload: CreateMediaInput) {
    this.payload = payload;
  }
}
