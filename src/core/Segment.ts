import type { SegmentInfo, SegmentStatus } from "@/types";

export interface Claim {
    position: number;
    length: number;
}

/**
 * A contiguous byte range `[start, end)` of the resource and the write cursor
 * inside it. Bytes before `cursor` have been handed to a writer; bytes from
 * `cursor` to `end` are still owed.
 */
export class Segment {
    private _start: number;
    private _end: number;
    private _cursor: number;
    private _status: SegmentStatus = "active";

    constructor(
        public readonly index: number,
        start: number,
        end: number
    ) {
        if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0 || end < start)
            throw new RangeError(`Invalid segment range [${start}, ${end})`);

        this._start = start;
        this._end = end;
        this._cursor = start;
    }

    get start(): number {
        return this._start;
    }

    get end(): number {
        return this._end;
    }

    get cursor(): number {
        return this._cursor;
    }

    get status(): SegmentStatus {
        return this._status;
    }

    get remaining(): number {
        return this._end - this._cursor;
    }

    /**
     * Reserve up to `length` bytes at the cursor. The cursor moves before the
     * caller writes, so a split made while the write is pending cannot hand the
     * same bytes to another segment.
     */
    claim(length: number): Claim {
        this.assertActive("claim bytes");

        const claimed = Math.max(0, Math.min(length, this.remaining));
        const position = this._cursor;
        this._cursor += claimed;
        return { position, length: claimed };
    }

    /**
     * Give the upper half of the unclaimed bytes to `receiver`; the midpoint
     * rounds toward this segment's cursor.
     */
    splitInto(receiver: Segment): void {
        this.assertActive("split");
        if (receiver === this) throw new Error(`Segment ${this.index} cannot split into itself`);

        const midpoint = this._cursor + Math.floor(this.remaining / 2);
        receiver.reassign(midpoint, this._end);
        this._end = midpoint;
    }

    close(): void {
        this._status = "closed";
    }

    toJSON(): SegmentInfo {
        return {
            index: this.index,
            start: this._start,
            end: this._end,
            cursor: this._cursor,
            remaining: this.remaining,
            status: this._status,
        };
    }

    private reassign(start: number, end: number): void {
        this.assertActive("take over a range");
        if (this.remaining > 0)
            throw new Error(
                `Segment ${this.index} still owes ${this.remaining} bytes and cannot take over [${start}, ${end})`
            );

        this._start = start;
        this._cursor = start;
        this._end = end;
    }

    private assertActive(action: string): void {
        if (this._status === "closed")
            throw new Error(`Segment ${this.index} is closed and cannot ${action}`);
    }
}
