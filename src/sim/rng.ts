import alea from "alea";

/** Uniform draw in [0, 1). */
export type Rng = () => number;

/** Seeded PRNG. The same seed always yields the same sequence. */
export function createRng(seed: string | number): Rng {
  const prng = alea(seed);
  return () => {
    const r = prng();
    // Anything outside [0, 1) collapses to 0.
    return r >= 0 && r < 1 ? r : 0;
  };
}
