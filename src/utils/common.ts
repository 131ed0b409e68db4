/**
 * Common utility functions shared across the codebase
 */
import { basename } from "node:path";
import { FALLBACK_FILENAME } from "./constants";

/**
 * Decoded last path segment of the URL, reduced to a bare file name
 */
export function extractFilename(url: string): string {
    let decoded: string;
    try {
        const segment = new URL(url).pathname.split("/").pop() ?? "";
        decoded = decodeURIComponent(segment);
    } catch {
        return FALLBACK_FILENAME;
    }

    const filename = basename(decoded.replaceAll("\\", "/"));
    return filename === "" || filename === "." || filename === ".." ? FALLBACK_FILENAME : filename;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
    if (bytes <= 0) return "0B";
    const k = 1024;
    const sizes = ["B", "KiB", "MiB", "GiB", "TiB"];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + sizes[i];
}

/**
 * Format duration in seconds to human-readable string
 */
export function formatDuration(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds < 0) return "--";
    if (seconds < 0.5) return "<1s";

    if (seconds < 60) return `${Math.floor(seconds)}s`;

    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);

    if (minutes < 60) return secs > 0 ? `${minutes}m${secs}s` : `${minutes}m`;

    const hours = Math.floor(minutes / 60);
    const mins = minutes % 60;
    return mins > 0 ? `${hours}h${mins}m` : `${hours}h`;
}

/**
 * Convert unknown error to Error instance
 */
export function toError(error: unknown, defaultMessage: string): Error {
    return error instanceof Error ? error : new Error(`${defaultMessage}: ${String(error)}`);
}

/**
 * True for the errors an aborted request or stream rejects with
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
    if (signal?.aborted) return true;
    if (!(error instanceof Error)) return false;

    const code = "code" in error ? error.code : undefined;
    return error.name === "AbortError" || code === "ABORT_ERR" || code === "ERR_CANCELED";
}
