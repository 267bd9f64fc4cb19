/**
 * Fixed-capacity staging buffer for padded output.
 *
 * Capacity is the longest text the address family can produce, so a write
 * past the end is a formatter bug and throws instead of truncating.
 */
export class DisplayBuffer {
  private readonly capacity: number;
  private text = '';

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid buffer capacity: ${capacity}`);
    }
    this.capacity = capacity;
  }

  write(chunk: string): this {
    if (this.text.length + chunk.length > this.capacity) {
      throw new Error(
        `DisplayBuffer overflow: ${this.text.length + chunk.length} characters exceed capacity ${this.capacity}`,
      );
    }
    this.text += chunk;
    return this;
  }

  get length(): number {
    return this.text.length;
  }

  asString(): string {
    return this.text;
  }
}
