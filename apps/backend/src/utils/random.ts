export interface Rng {
  /** Uniform in [0, 1). */
  next(): number;
  between(min: number, max: number): number;
  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  chance(probability: number): boolean;
  pick<T>(values: readonly T[]): T;
}

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const rngFromSource = (source: () => number): Rng => ({
  next: source,
  between: (min, max) => min + source() * (max - min),
  int: (min, max) => min + Math.floor(source() * (max - min + 1)),
  chance: (probability) => source() < probability,
  pick: <T>(values: readonly T[]): T => {
    if (values.length === 0) {
      throw new Error("Cannot pick random value from an empty collection");
    }
    const index = Math.min(values.length - 1, Math.floor(source() * values.length));
    const value = values[index];
    if (value === undefined) {
      throw new Error(`No value at index ${index}`);
    }
    return value;
  },
});

export const createRng = (seed: number): Rng => rngFromSource(mulberry32(seed));

export const randomSeed = () => Math.floor(Math.random() * 0xffffffff);
