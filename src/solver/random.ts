/** Seeded Mulberry32; returns floats in [0, 1). Used to sample benchmark secrets. */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0
  return () => {
    t = (t + 0x6d2b79f5) >>> 0
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

/** Draw `count` distinct indices below `length` (all of them, in order, when count >= length). */
export function sampleIndices(length: number, count: number, rand: () => number): number[] {
  if (count >= length) return [...Array(length).keys()]
  const picked = new Set<number>()
  while (picked.size < count) {
    picked.add(Math.floor(rand() * length))
  }
  return [...picked]
}
