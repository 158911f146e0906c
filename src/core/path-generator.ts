/**
 * Synthetic request paths.
 *
 * A run draws a pool of three tokens once, then every request path is
 * `/api/` followed by 1–6 tokens sampled from that pool (with repetition)
 * and a trailing slash.
 *
 * @module
 */

import type { TokenPool } from "../types/run.js";

/** Uniform source in [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

const ALPHANUMERIC = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const INTERIOR = `${ALPHANUMERIC}-_.`;

export const TOKEN_MIN_LENGTH = 3;
export const TOKEN_MAX_LENGTH = 12;
export const MIN_SEGMENTS = 1;
export const MAX_SEGMENTS = 6;

/** Integer in [min, max], both inclusive. */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick(alphabet: string, random: RandomSource): string {
  return alphabet.charAt(randomInt(0, alphabet.length - 1, random));
}

/**
 * One path segment of the given length. The first and last characters are
 * alphanumeric; interior characters may also be `-`, `_` or `.`.
 */
export function generateToken(length: number, random: RandomSource = Math.random): string {
  if (length <= 1) return pick(ALPHANUMERIC, random);

  let token = pick(ALPHANUMERIC, random);
  for (let i = 0; i < length - 2; i++) {
    token += pick(INTERIOR, random);
  }
  return token + pick(ALPHANUMERIC, random);
}

export function newTokenPool(random: RandomSource = Math.random): TokenPool {
  const next = () => generateToken(randomInt(TOKEN_MIN_LENGTH, TOKEN_MAX_LENGTH, random), random);
  return [next(), next(), next()];
}

export function generatePath(pool: TokenPool, random: RandomSource = Math.random): string {
  const count = randomInt(MIN_SEGMENTS, MAX_SEGMENTS, random);
  const segments: string[] = [];
  for (let i = 0; i < count; i++) {
    segments.push(pool[randomInt(0, pool.length - 1, random)]);
  }
  return `/api/${segments.join("/")}/`;
}
