import type { SegmentInfo } from "@/types";
import { partition } from "./partition";
import { Segment } from "./Segment";

export type RebalanceDecision =
    | { action: "split"; donor: Segment; receiver: Segment }
    | { action: "close"; segment: Segment; drained: boolean };

/**
 * Owns every segment of one download and decides, each time a segment runs dry,
 * whether it takes half of the busiest segment's tail or shuts down.
 *
 * Nothing here awaits: under the event loop a rebalance (scan, split, count
 * update) runs to completion before any other callback can observe the segments.
 */
export class SegmentStore {
    readonly segments: readonly Segment[];
    readonly splitThreshold: number;
    readonly drained: Promise<void>;

    private _activeCount: number;
    private resolveDrained: () => void = () => {};

    constructor(segments: Segment[], splitThreshold: number) {
        if (segments.length === 0) throw new Error("A segment store needs at least one segment");
        if (!Number.isFinite(splitThreshold) || splitThreshold < 1)
            throw new RangeError(`Split threshold must be at least 1, got ${splitThreshold}`);

        this.segments = segments;
        this.splitThreshold = splitThreshold;
        this._activeCount = segments.length;
        this.drained = new Promise<void>(resolve => {
            this.resolveDrained = resolve;
        });
    }

    static partition(totalLength: number, workerCount: number, splitThreshold: number): SegmentStore {
        const segments = partition(totalLength, workerCount).map(
            (range, index) => new Segment(index, range.start, range.end)
        );
        return new SegmentStore(segments, splitThreshold);
    }

    get activeCount(): number {
        return this._activeCount;
    }

    get(index: number): Segment {
        const segment = this.segments[index];
        if (!segment) throw new Error(`Segment ${index} not found`);
        return segment;
    }

    /**
     * Segment with the most unclaimed bytes; the first one wins a tie
     */
    findBusiest(): Segment {
        let busiest = this.get(0);
        for (const segment of this.segments) {
            if (segment.remaining > busiest.remaining) busiest = segment;
        }
        return busiest;
    }

    rebalance(index: number): RebalanceDecision {
        const finished = this.get(index);
        if (finished.status === "closed")
            throw new Error(`Segment ${index} is already closed`);
        if (finished.remaining > 0)
            throw new Error(`Segment ${index} still owes ${finished.remaining} bytes`);

        const busiest = this.findBusiest();
        if (busiest.remaining < this.splitThreshold) {
            return { action: "close", segment: finished, drained: this.close(finished) };
        }

        busiest.splitInto(finished);
        return { action: "split", donor: busiest, receiver: finished };
    }

    /**
     * Remaining bytes across all segments
     */
    outstanding(): number {
        return this.segments.reduce((sum, segment) => sum + segment.remaining, 0);
    }

    snapshot(): SegmentInfo[] {
        return this.segments.map(segment => segment.toJSON());
    }

    private close(segment: Segment): boolean {
        if (this._activeCount === 0) throw new Error("No active segments left to close");

        segment.close();
        this._activeCount--;

        if (this._activeCount === 0) {
            this.resolveDrained();
            return true;
        }
        return false;
    }
}
