// ByteReader.ts
export class ShortReadError extends Error {
  constructor(public readonly offset: number, public readonly wanted: number) {
    super(`Short read: wanted ${wanted} byte(s) at offset ${offset}`);
    this.name = "ShortReadError";
  }
}

/** Little-endian cursor over a byte buffer. Never reads past the end. */
export class ByteReader {
  private view: DataView;
  private pos: number;

  constructor(private bytes: Uint8Array, start = 0) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.pos = start;
  }

  get offset() { return this.pos; }
  get remaining() { return Math.max(0, this.bytes.length - this.pos); }

  private need(n: number) {
    if (this.pos + n > this.bytes.length) throw new ShortReadError(this.pos, n);
  }

  u8() { this.need(1); return this.view.getUint8(this.pos++); }
  u16() { this.need(2); const v = this.view.getUint16(this.pos, true); this.pos += 2; return v; }
  u32() { this.need(4); const v = this.view.getUint32(this.pos, true); this.pos += 4; return v; }
  skip(n: number) { this.need(n); this.pos += n; return this; }

  /** Returns a view, not a copy. */
  take(n: number) {
    this.need(n);
    const out = this.bytes.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}
