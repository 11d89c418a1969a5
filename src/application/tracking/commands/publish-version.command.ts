import type { PublishVersionInput } from '../dto/publish-version.dto.js';

export class PublishVersionCommand {
  public readonly payload: PublishVersionInput;

  public constructor(payload: PublishVersionInput) {
    this.payload = payload;
  }
}
