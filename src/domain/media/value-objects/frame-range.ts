/**
 * Inclusive span of frame numbers a backend evaluates over.
 */
export class FrameRange {
  private constructor(
    public readonly first: number,
    public readonly last: number,
  ) {}

  public static create(first: number, last: number): FrameRange {
    if (!Number.isInteger(first) || !Number.isInteger(last)) {
      throw new Error(`Frame range bounds must be integers (got ${first}-${last})`);
    }

    if (first > last) {
      throw new Error(`Frame range first frame ${first} is after last frame ${last}`);
    }

    return new FrameRange(first, last);
  }

  public get length(): number {
    return this.last - this.first + 1;
  }

  public toString(): string {
    return `${this.first}-${this.last}`;
  }
}
