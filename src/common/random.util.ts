import { createHash } from 'crypto';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded generator (sfc32) whose 128-bit state is taken from the sha256 of
 * the seed, so neighbouring seeds such as "1" and "2" give unrelated streams.
 */
export function seededRandom(seed: string | number): RandomSource {
  const h = createHash('sha256').update(String(seed)).digest();
  let a = h.readUInt32BE(0);
  let b = h.readUInt32BE(4);
  let c = h.readUInt32BE(8);
  let d = h.readUInt32BE(12);

  const next = () => {
    let t = (a + b) | 0;
    a = b ^ (b >>> 9);
    b = (c + (c << 3)) | 0;
    c = (c << 21) | (c >>> 11);
    d = (d + 1) | 0;
    t = (t + d) | 0;
    c = (c + t) | 0;
    return (t >>> 0) / 4294967296;
  };

  // discard the first outputs while the state mixes
  for (let i = 0; i < 12; i++) next();
  return next;
}

export function createRandomSource(seed?: string | number): RandomSource {
  return seed === undefined || seed === '' ? Math.random : seededRandom(seed);
}

/** Fisher-Yates; returns a shuffled copy and leaves the input alone. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
