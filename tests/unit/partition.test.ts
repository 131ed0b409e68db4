import { describe, expect, test } from "vitest";
import { computeStops, partition } from "@/core";

describe("computeStops", () => {
    test("cuts 1000 bytes into four even segments", () => {
        expect(computeStops(1000, 4)).toEqual([0, 250, 500, 750, 1000]);
    });

    test("rounds cut points down", () => {
        expect(computeStops(10, 3)).toEqual([0, 3, 6, 10]);
        expect(computeStops(3, 4)).toEqual([0, 0, 1, 2, 3]);
    });

    test("handles an empty resource", () => {
        expect(computeStops(0, 3)).toEqual([0, 0, 0, 0]);
    });

    test("returns the same stops for the same input", () => {
        expect(computeStops(123_457, 7)).toEqual(computeStops(123_457, 7));
    });

    test("rejects invalid input", () => {
        expect(() => computeStops(-1, 2)).toThrow(RangeError);
        expect(() => computeStops(10, 0)).toThrow(RangeError);
        expect(() => computeStops(10, 1.5)).toThrow(RangeError);
        expect(() => computeStops(0.5, 2)).toThrow(RangeError);
    });
});

describe("partition", () => {
    const lengths = [0, 1, 7, 1000, 12_345, 2 ** 40 + 3];

    test("covers [0, totalLength) without gaps or overlap", () => {
        for (const totalLength of lengths) {
            for (let workers = 1; workers <= 8; workers++) {
                const ranges = partition(totalLength, workers);

                expect(ranges).toHaveLength(workers);
                expect(ranges[0]?.start).toBe(0);
                expect(ranges[ranges.length - 1]?.end).toBe(totalLength);

                ranges.forEach((range, i) => {
                    expect(range.end).toBeGreaterThanOrEqual(range.start);
                    const next = ranges[i + 1];
                    if (next) expect(next.start).toBe(range.end);
                });
            }
        }
    });

    test("keeps segment sizes within one byte of each other", () => {
        for (const totalLength of lengths) {
            for (let workers = 1; workers <= 8; workers++) {
                const sizes = partition(totalLength, workers).map(range => range.end - range.start);
                expect(Math.max(...sizes) - Math.min(...sizes)).toBeLessThanOrEqual(1);
            }
        }
    });
});
