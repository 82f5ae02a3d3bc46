/** Uniform source in [0, 1). Sampling and dice both draw from this so tests can script them. */
export interface RandomSource {
  next(): number;
}

export function hash32(input: string): number {
  let hash = 2166136261;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = Math.imul(t ^ (t >>> 15), t | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function createSeededRandom(seed: string | number): RandomSource {
  const rand = mulberry32(typeof seed === 'number' ? seed : hash32(seed));
  return { next: () => rand() };
}

/** Draws a 32-bit seed for an independent child source. */
export function deriveSeed(rng: RandomSource): number {
  return Math.floor(rng.next() * 4294967296) >>> 0;
}

export function rollDie(rng: RandomSource, sides: number): number {
  const roll = Math.floor(rng.next() * sides) + 1;
  return Math.min(sides, Math.max(1, roll));
}
