import { setTimeout as delay } from "node:timers/promises";
import type { SegmentHandle } from "@/storage";
import type { RangeTransport } from "@/types";
import { isAbortError, toError } from "@/utils/common";
import type { Segment } from "./Segment";
import type { SegmentStore } from "./SegmentStore";

export interface WorkerHooks {
    onWritten(bytes: number): void;
    onSplit(donor: Segment, receiver: Segment): void;
    onClosed(segment: Segment, drained: boolean): void;
    onRetry(segment: Segment, error: Error, attempt: number): void;
}

export interface SegmentWorkerOptions {
    url: string;
    index: number;
    store: SegmentStore;
    transport: RangeTransport;
    handle: SegmentHandle;
    signal: AbortSignal;
    retries: number;
    retryDelay: number;
    hooks: WorkerHooks;
}

/**
 * Bytes were claimed but never reached the file; retrying from the cursor would
 * skip them, so the job fails instead.
 */
class StagingWriteError extends Error {
    constructor(index: number, position: number, cause: unknown) {
        super(
            `Segment ${index} could not write at byte ${position}: ${toError(cause, "Write failed").message}`,
            { cause }
        );
        this.name = "StagingWriteError";
    }
}

/**
 * Drives one connection: fetch the segment's unclaimed bytes, then ask the store
 * for more work until it says to stop.
 */
export class SegmentWorker {
    private readonly segment: Segment;

    constructor(private readonly options: SegmentWorkerOptions) {
        this.segment = options.store.get(options.index);
    }

    async run(): Promise<void> {
        const { store, hooks, signal } = this.options;

        try {
            while (!signal.aborted) {
                await this.fetchRemaining();
                if (signal.aborted) return;

                const decision = store.rebalance(this.segment.index);
                if (decision.action === "close") {
                    hooks.onClosed(decision.segment, decision.drained);
                    return;
                }
                hooks.onSplit(decision.donor, decision.receiver);
            }
        } finally {
            await this.options.handle.close();
        }
    }

    /**
     * Fetch until nothing is owed. An attempt that ends short is retried from the
     * cursor; the segment fails once `retries` retries in a row bring no bytes.
     */
    private async fetchRemaining(): Promise<void> {
        const { retries, retryDelay, signal, hooks } = this.options;
        let failures = 0;
        let attempts = 0;

        while (this.segment.remaining > 0) {
            const cursorBefore = this.segment.cursor;
            let cause: Error;

            try {
                await this.pump();
                if (this.segment.remaining === 0) return;
                cause = new Error(
                    `Connection closed at byte ${this.segment.cursor} before reaching ${this.segment.end}`
                );
            } catch (error) {
                if (isAbortError(error, signal)) return;
                if (error instanceof StagingWriteError) throw error;
                // A split may have taken every byte this request still owed
                if (this.segment.remaining === 0) return;
                cause = toError(error, "Range request failed");
            }

            if (this.segment.cursor > cursorBefore) failures = 0;
            else if (++failures > retries) {
                throw new Error(
                    `Segment ${this.segment.index} gave up at byte ${this.segment.cursor} after ${retries} retries: ${cause.message}`
                );
            }

            hooks.onRetry(this.segment, cause, ++attempts);
            try {
                await delay(retryDelay, undefined, { signal });
            } catch (error) {
                if (isAbortError(error, signal)) return;
                throw error;
            }
        }
    }

    private async pump(): Promise<void> {
        const { transport, url, handle, signal, hooks } = this.options;
        const range = { start: this.segment.cursor, end: this.segment.end };

        for await (const chunk of transport.streamRange(url, range, signal)) {
            const claim = this.segment.claim(chunk.length);
            if (claim.length > 0) {
                const data = claim.length < chunk.length ? chunk.subarray(0, claim.length) : chunk;
                try {
                    await handle.write(claim.position, data);
                } catch (error) {
                    throw new StagingWriteError(this.segment.index, claim.position, error);
                }
                hooks.onWritten(claim.length);
            }

            // A split may have pulled `end` below the bytes this request still carries
            if (this.segment.remaining === 0) break;
        }
    }
}
