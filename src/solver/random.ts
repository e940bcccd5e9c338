// Deterministic lightweight RNG (Mulberry32)
// Reference: https://stackoverflow.com/a/47593316 (public domain)

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number

export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0
  return function () {
    t += 0x6d2b79f5
    let x = Math.imul(t ^ (t >>> 15), 1 | t)
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

/** Seeded source; without a seed the clock picks one. */
export function seededRandom(seed?: number): RandomSource {
  return mulberry32(seed ?? Date.now())
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) throw new RangeError('cannot pick from an empty list')
  const i = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[i]
}
