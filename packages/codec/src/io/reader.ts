import { UnexpectedEofError } from "../errors";

/**
 * Forward-only cursor over an input buffer. Every read checks the remaining
 * length first and fails with `UnexpectedEofError` instead of reading past the end.
 */
export class ByteReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(data: Uint8Array) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  get source(): Uint8Array {
    return this.data;
  }

  ensureAvailable(size: number, context?: string): void {
    if (size > this.remaining) {
      throw new UnexpectedEofError(size, this.remaining, context);
    }
  }

  readByte(context?: string): number {
    this.ensureAvailable(1, context);
    return this.data[this.position++];
  }

  /** Returns a copy of the next `length` bytes. */
  readBytes(length: number, context?: string): Uint8Array {
    this.ensureAvailable(length, context);
    const bytes = this.data.slice(this.position, this.position + length);
    this.position += length;
    return bytes;
  }

  readUint16(context?: string): number {
    this.ensureAvailable(2, context);
    const value = this.view.getUint16(this.position, true);
    this.position += 2;
    return value;
  }

  readUint32(context?: string): number {
    this.ensureAvailable(4, context);
    const value = this.view.getUint32(this.position, true);
    this.position += 4;
    return value;
  }

  readInt8(context?: string): number {
    this.ensureAvailable(1, context);
    const value = this.view.getInt8(this.position);
    this.position += 1;
    return value;
  }

  readInt16(context?: string): number {
    this.ensureAvailable(2, context);
    const value = this.view.getInt16(this.position, true);
    this.position += 2;
    return value;
  }

  readInt32(context?: string): number {
    this.ensureAvailable(4, context);
    const value = this.view.getInt32(this.position, true);
    this.position += 4;
    return value;
  }

  readBigUint64(context?: string): bigint {
    this.ensureAvailable(8, context);
    const value = this.view.getBigUint64(this.position, true);
    this.position += 8;
    return value;
  }

  readBigInt64(context?: string): bigint {
    this.ensureAvailable(8, context);
    const value = this.view.getBigInt64(this.position, true);
    this.position += 8;
    return value;
  }

  readBigUintLE(byteLength: number, context?: string): bigint {
    this.ensureAvailable(byteLength, context);
    let value = 0n;
    for (let i = byteLength - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.data[this.position + i]);
    }
    this.position += byteLength;
    return value;
  }
}
