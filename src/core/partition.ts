import type { ByteRange } from "@/types";

/**
 * Evenly spaced cut points over `[0, totalLength)`: `workerCount` floors of
 * `totalLength * i / workerCount`, then `totalLength` itself.
 */
export function computeStops(totalLength: number, workerCount: number): number[] {
    if (!Number.isSafeInteger(totalLength) || totalLength < 0)
        throw new RangeError(`Total length must be a non-negative integer, got ${totalLength}`);
    if (!Number.isInteger(workerCount) || workerCount < 1)
        throw new RangeError(`Worker count must be a positive integer, got ${workerCount}`);

    const stops: number[] = [];
    for (let i = 0; i < workerCount; i++) {
        stops.push(Math.floor((totalLength * i) / workerCount));
    }
    stops.push(totalLength);
    return stops;
}

export function partition(totalLength: number, workerCount: number): ByteRange[] {
    const stops = computeStops(totalLength, workerCount);
    return stops.slice(0, -1).map((start, i) => ({ start, end: stops[i + 1] ?? totalLength }));
}
