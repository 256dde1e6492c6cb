// ByteWriter.ts
export class ByteWriter {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(capacity = 256) {
    this.buf = new Uint8Array(Math.max(1, capacity));
    this.view = new DataView(this.buf.buffer);
  }

  get length() { return this.pos; }

  private ensure(n: number) {
    if (this.pos + n <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < this.pos + n) cap *= 2;
    const next = new Uint8Array(cap);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  u8(n: number) { this.ensure(1); this.view.setUint8(this.pos, n & 0xff); this.pos += 1; return this; }
  u16(n: number) { this.ensure(2); this.view.setUint16(this.pos, n & 0xffff, true); this.pos += 2; return this; }
  u32(n: number) { this.ensure(4); this.view.setUint32(this.pos, n >>> 0, true); this.pos += 4; return this; }
  zeros(n: number) { this.ensure(n); this.buf.fill(0, this.pos, this.pos + n); this.pos += n; return this; }
  bytes(arr: Uint8Array) { this.ensure(arr.length); this.buf.set(arr, this.pos); this.pos += arr.length; return this; }

  toBytes() { return this.buf.slice(0, this.pos); }
}
