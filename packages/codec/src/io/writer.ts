/**
 * Append-only byte buffer. Grows by doubling; `finish()` hands out an exact-size copy.
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity = 64) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 8));
    this.view = new DataView(this.buffer.buffer);
  }

  get byteLength(): number {
    return this.length;
  }

  writeByte(byte: number): void {
    this.grow(1);
    this.buffer[this.length++] = byte & 0xff;
  }

  writeBytes(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  writeUint16(value: number): void {
    this.grow(2);
    this.view.setUint16(this.length, value, true);
    this.length += 2;
  }

  writeUint32(value: number): void {
    this.grow(4);
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  writeInt8(value: number): void {
    this.grow(1);
    this.view.setInt8(this.length, value);
    this.length += 1;
  }

  writeInt16(value: number): void {
    this.grow(2);
    this.view.setInt16(this.length, value, true);
    this.length += 2;
  }

  writeInt32(value: number): void {
    this.grow(4);
    this.view.setInt32(this.length, value, true);
    this.length += 4;
  }

  writeBigUint64(value: bigint): void {
    this.grow(8);
    this.view.setBigUint64(this.length, value, true);
    this.length += 8;
  }

  writeBigInt64(value: bigint): void {
    this.grow(8);
    this.view.setBigInt64(this.length, value, true);
    this.length += 8;
  }

  /** Writes the low `byteLength` bytes of a non-negative integer, least significant first. */
  writeBigUintLE(value: bigint, byteLength: number): void {
    this.grow(byteLength);
    let remaining = value;
    for (let i = 0; i < byteLength; i++) {
      this.buffer[this.length++] = Number(remaining & 0xffn);
      remaining >>= 8n;
    }
  }

  finish(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private grow(additional: number): void {
    if (this.length + additional <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < this.length + additional) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}
