import type { DownloadProgress } from "@/types";
import { BYTES_PER_KB } from "@/utils/constants";

export interface ProgressSamplerOptions {
    totalBytes: number;
    intervalMs: number;
    read: () => number; // monotonically increasing bytes-written counter
    onSample: (progress: DownloadProgress) => void;
    now?: () => number;
}

/**
 * Samples the bytes-written counter on a fixed interval and reports throughput
 * over the last interval. Observational only.
 */
export class ProgressSampler {
    private timer: ReturnType<typeof setInterval> | null = null;
    private lastTime = 0;
    private lastWritten = 0;
    private readonly now: () => number;

    constructor(private readonly options: ProgressSamplerOptions) {
        this.now = options.now ?? (() => Date.now());
    }

    start(): void {
        this.stop();
        this.lastTime = this.now();
        this.lastWritten = this.options.read();

        if (this.options.intervalMs <= 0) return;
        this.timer = setInterval(() => {
            this.options.onSample(this.sample());
        }, this.options.intervalMs);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    sample(): DownloadProgress {
        const { totalBytes } = this.options;
        const time = this.now();
        const written = this.options.read();
        const elapsedSeconds = (time - this.lastTime) / 1000;

        const speed =
            elapsedSeconds > 0 ? (written - this.lastWritten) / (elapsedSeconds * BYTES_PER_KB) : 0;
        const percent = totalBytes > 0 ? Math.floor((written * 100) / totalBytes) : 100;
        const remainingBytes = Math.max(0, totalBytes - written);
        const eta =
            remainingBytes === 0
                ? 0
                : speed > 0
                  ? remainingBytes / (speed * BYTES_PER_KB)
                  : Number.POSITIVE_INFINITY;

        this.lastTime = time;
        this.lastWritten = written;

        return { totalBytes, downloadedBytes: written, percent, speed, eta };
    }
}
