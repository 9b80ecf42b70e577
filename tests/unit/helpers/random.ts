/**
 * Seeded pseudo-random numbers so property tests replay the same cases.
 */

export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: () => number, max: number): number {
  return Math.floor(random() * max);
}

const ALPHABET = ['a', 'b', 'c', ' ', '\n', 'x', 'y', '\t', 'é', '\r\n'];

export function randomText(random: () => number, length: number): string {
  let text = '';
  for (let i = 0; i < length; i++) {
    text += ALPHABET[randomInt(random, ALPHABET.length)] ?? '';
  }
  return text;
}
