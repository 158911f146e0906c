import fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { TokenPool } from "../types/run.js";
import { generatePath, generateToken, newTokenPool } from "./path-generator.js";

const unitInterval = fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true });

/** Deterministic random source backed by a fast-check generated list. */
function replay(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

const TOKEN_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9_.-]*[A-Za-z0-9])?$/;

describe("path generator property tests", () => {
  it("tokens respect the edge and interior alphabets", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 12 }),
        fc.array(unitInterval, { minLength: 1, maxLength: 20 }),
        (length, values) => {
          const token = generateToken(length, replay(values));
          expect(token).toHaveLength(length);
          expect(token).toMatch(TOKEN_PATTERN);
        },
      ),
    );
  });

  it("pool tokens are 3 to 12 characters long", () => {
    fc.assert(
      fc.property(fc.array(unitInterval, { minLength: 1, maxLength: 50 }), (values) => {
        const pool = newTokenPool(replay(values));
        expect(pool).toHaveLength(3);
        for (const token of pool) {
          expect(token.length).toBeGreaterThanOrEqual(3);
          expect(token.length).toBeLessThanOrEqual(12);
        }
      }),
    );
  });

  it("paths are /api/<token>(/<token>){0,5}/ over the run's pool", () => {
    fc.assert(
      fc.property(
        fc.array(unitInterval, { minLength: 1, maxLength: 50 }),
        fc.array(unitInterval, { minLength: 1, maxLength: 20 }),
        (poolValues, pathValues) => {
          const pool: TokenPool = newTokenPool(replay(poolValues));
          const path = generatePath(pool, replay(pathValues));

          expect(path.startsWith("/api/")).toBe(true);
          expect(path.endsWith("/")).toBe(true);

          const segments = path.slice("/api/".length, -1).split("/");
          expect(segments.length).toBeGreaterThanOrEqual(1);
          expect(segments.length).toBeLessThanOrEqual(6);
          for (const segment of segments) {
            expect(pool).toContain(segment);
          }
        },
      ),
    );
  });
});
