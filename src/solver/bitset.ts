/** Fixed-size bitset over word indices; backs CandidateSet's alive mask. */
export class Bitset {
  private words: Uint32Array
  readonly size: number // number of bits

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 0) throw new RangeError('size must be an integer >= 0')
    this.size = size
    const wordCount = (size + 31) >>> 5 // divide by 32 round up
    this.words = new Uint32Array(wordCount)
  }

  private maskLast(): number {
    const rem = this.size & 31
    return rem === 0 ? 0xffffffff : (1 << rem) - 1
  }

  fillAll(): void {
    this.words.fill(0xffffffff)
    // Mask off unused bits in last word
    if (this.words.length > 0) {
      const last = this.words.length - 1
      this.words[last]! &= this.maskLast()
    }
  }

  get(i: number): boolean {
    if (i < 0 || i >= this.size) throw new RangeError('index out of range')
    return (this.words[i >>> 5]! & (1 << (i & 31))) !== 0
  }

  clear(i: number): void {
    if (i < 0 || i >= this.size) throw new RangeError('index out of range')
    this.words[i >>> 5]! &= ~(1 << (i & 31))
  }

  count(): number {
    let total = 0
    for (let i = 0; i < this.words.length; i++) {
      let v = this.words[i]!
      // Kernighan popcount loop
      while (v) {
        v &= v - 1
        total++
      }
    }
    return total
  }

  *indices(): Iterable<number> {
    const n = this.size
    for (let w = 0; w < this.words.length; w++) {
      let word = this.words[w]!
      while (word) {
        const lsb = word & -word
        const bit = Math.clz32(lsb) ^ 31 // position within word 0..31
        const idx = (w << 5) + bit
        if (idx < n) yield idx
        word ^= lsb
      }
    }
  }

  clone(): Bitset {
    const bs = new Bitset(this.size)
    bs.words.set(this.words)
    return bs
  }
}
