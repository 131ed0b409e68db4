import type { DownloaderOptions } from "@/types";
import {
    DEFAULT_CONNECTIONS,
    DEFAULT_CONNECT_TIMEOUT_MS,
    DEFAULT_PROGRESS_INTERVAL_MS,
    DEFAULT_RETRIES,
    DEFAULT_RETRY_DELAY_MS,
    DEFAULT_SPLIT_THRESHOLD_BYTES,
    DEFAULT_TIMEOUT_MS,
} from "@/utils/constants";

export const DEFAULT_OPTIONS: Required<DownloaderOptions> = {
    connections: DEFAULT_CONNECTIONS,
    maxConcurrentDownloads: 1,
    splitThreshold: DEFAULT_SPLIT_THRESHOLD_BYTES,
    timeout: DEFAULT_TIMEOUT_MS,
    connectTimeout: DEFAULT_CONNECT_TIMEOUT_MS,
    retries: DEFAULT_RETRIES,
    retryDelay: DEFAULT_RETRY_DELAY_MS,
    headers: {},
    outputDirectory: ".",
    progressInterval: DEFAULT_PROGRESS_INTERVAL_MS,
};

export function parseByteSize(size: number | string): number {
    if (typeof size === "number") return size;

    const units: Record<string, number> = {
        B: 1,
        KB: 1024,
        MB: 1024 * 1024,
        GB: 1024 * 1024 * 1024,
    };

    const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)?$/i);
    if (!match) throw new Error(`Invalid byte size format: ${size}`);

    const [, amount = "", unitToken = "B"] = match;
    const multiplier = units[unitToken.toUpperCase()];
    if (multiplier === undefined) throw new Error(`Invalid unit in byte size: ${size}`);

    return Math.floor(parseFloat(amount) * multiplier);
}

export function mergeOptions(options?: DownloaderOptions): Required<DownloaderOptions> {
    return {
        ...DEFAULT_OPTIONS,
        ...options,
        headers: {
            ...DEFAULT_OPTIONS.headers,
            ...options?.headers,
        },
    };
}

/**
 * Reject option values the download cannot run with
 */
export function validateOptions(options: Required<DownloaderOptions>): void {
    if (!Number.isInteger(options.connections) || options.connections < 1)
        throw new Error(`Connection count must be a positive integer, got ${options.connections}`);

    if (!Number.isInteger(options.maxConcurrentDownloads) || options.maxConcurrentDownloads < 1)
        throw new Error(
            `Concurrent download limit must be a positive integer, got ${options.maxConcurrentDownloads}`
        );

    if (parseByteSize(options.splitThreshold) < 1)
        throw new Error(`Split threshold must be at least one byte, got ${options.splitThreshold}`);

    if (!Number.isInteger(options.retries) || options.retries < 0)
        throw new Error(`Retries must be a non-negative integer, got ${options.retries}`);

    for (const key of ["retryDelay", "timeout", "connectTimeout", "progressInterval"] as const) {
        if (!Number.isFinite(options[key]) || options[key] < 0)
            throw new Error(`Option ${key} must be a non-negative number, got ${options[key]}`);
    }
}
