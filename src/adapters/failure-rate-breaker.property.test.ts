import fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import { FailureRateBreaker } from "./failure-rate-breaker.js";

const outcomes = fc.array(fc.boolean(), { maxLength: 200 });

function replay(breaker: FailureRateBreaker, results: boolean[]): void {
  for (const ok of results) {
    if (ok) breaker.recordSuccess();
    else breaker.recordFailure();
  }
}

describe("FailureRateBreaker property tests", () => {
  it("never trips below the minimum sample size", () => {
    const belowMinimum = fc
      .integer({ min: 1, max: 100 })
      .chain((minSampleSize) =>
        fc.tuple(
          fc.constant(minSampleSize),
          fc.array(fc.boolean(), { maxLength: minSampleSize - 1 }),
        ),
      );

    fc.assert(
      fc.property(
        belowMinimum,
        fc.double({ min: 0, max: 1, noNaN: true }),
        ([minSampleSize, results], failureThreshold) => {
          const breaker = new FailureRateBreaker({ minSampleSize, failureThreshold });
          replay(breaker, results);
          expect(breaker.shouldTrip()).toBe(false);
        },
      ),
    );
  });

  it("once tripped, stays tripped and cleans up exactly once", () => {
    fc.assert(
      fc.property(outcomes, fc.integer({ min: 1, max: 10 }), (later, checks) => {
        const onTrip = vi.fn();
        const breaker = new FailureRateBreaker({ minSampleSize: 5, failureThreshold: 0.2, onTrip });
        replay(breaker, [false, false, false, false, false]);
        expect(breaker.shouldTrip()).toBe(true);

        replay(breaker, later);
        for (let i = 0; i < checks; i++) {
          expect(breaker.shouldTrip()).toBe(true);
        }
        expect(onTrip).toHaveBeenCalledTimes(1);
      }),
    );
  });

  it("rates are complementary once anything is recorded", () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { minLength: 1, maxLength: 200 }), (results) => {
        const breaker = new FailureRateBreaker({ minSampleSize: 1, failureThreshold: 0.5 });
        replay(breaker, results);
        expect(breaker.totalRequests()).toBe(results.length);
        expect(breaker.failureRate() + breaker.completionRate()).toBeCloseTo(1, 12);
      }),
    );
  });

  it("trips exactly when the rule holds", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 50 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        outcomes,
        (minSampleSize, failureThreshold, results) => {
          const breaker = new FailureRateBreaker({ minSampleSize, failureThreshold });
          replay(breaker, results);
          const failed = results.filter((ok) => !ok).length;
          const expected =
            results.length >= minSampleSize && failed / results.length > failureThreshold;
          expect(breaker.shouldTrip()).toBe(expected);
        },
      ),
    );
  });
});
