export class BinaryReader {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readU32LE(): number {
    this.ensure(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  /** Reads the rest of the buffer as consecutive little-endian u32 values. */
  public readAllU32LE(): number[] {
    if (this.remaining() % 4 !== 0) {
      throw new Error(`Byte length ${this.remaining()} is not a multiple of 4`);
    }
    const out: number[] = [];
    while (this.remaining() > 0) out.push(this.readU32LE());
    return out;
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new Error(`Unexpected EOF: need ${n} bytes, have ${this.remaining()}`);
    }
  }
}
