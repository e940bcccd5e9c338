/** Fixed-size set of indices 0..size-1 packed 32 per word. */
export class Bitset {
  private readonly bits: Uint32Array
  readonly size: number

  constructor(size: number, full = false) {
    if (size < 0) throw new Error('size must be >= 0')
    this.size = size
    this.bits = new Uint32Array((size + 31) >>> 5)
    if (full && size > 0) {
      this.bits.fill(0xffffffff)
      const rem = size & 31
      if (rem !== 0) this.bits[this.bits.length - 1] = (1 << rem) - 1
    }
  }

  delete(i: number): void {
    if (i < 0 || i >= this.size) throw new RangeError('index out of range')
    this.bits[i >>> 5] &= ~(1 << (i & 31))
  }

  *indices(): IterableIterator<number> {
    for (let w = 0; w < this.bits.length; w++) {
      let v = this.bits[w]
      while (v) {
        const lsb = v & -v
        yield (w << 5) + (31 - Math.clz32(lsb))
        v ^= lsb
      }
    }
  }

  clone(): Bitset {
    const copy = new Bitset(this.size)
    copy.bits.set(this.bits)
    return copy
  }
}
