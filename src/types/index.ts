export type SegmentStatus = "active" | "closed";

export interface ByteRange {
    start: number; // inclusive
    end: number; // exclusive
}

export interface SegmentInfo {
    index: number;
    start: number;
    end: number;
    cursor: number;
    remaining: number;
    status: SegmentStatus;
}

export interface DownloadProgress {
    totalBytes: number;
    downloadedBytes: number;
    percent: number;
    speed: number; // KB per second over the last interval
    eta: number; // seconds
}

export interface DownloaderOptions {
    // Parallelism
    connections?: number;
    maxConcurrentDownloads?: number;

    // Rebalancing: segments with fewer remaining bytes are never split
    splitThreshold?: number | string; // e.g., 8192 or "8KB"

    // Network
    timeout?: number;
    connectTimeout?: number;
    retries?: number;
    retryDelay?: number;
    headers?: Record<string, string>;

    // Storage
    outputDirectory?: string;

    // Reporting
    progressInterval?: number; // milliseconds
}

export interface DownloadOptions {
    url: string;
    filename?: string;
    outputDir?: string;
}

export type DownloadStatus = "pending" | "downloading" | "completed" | "failed" | "cancelled";

export interface DownloadTaskInfo {
    id: string;
    url: string;
    filename: string;
    outputPath: string;
    stagingPath: string;
    totalSize: number;
    downloadedBytes: number;
    activeConnections: number;
    segments: SegmentInfo[];
    status: DownloadStatus;
    progress: DownloadProgress;
    error?: Error;
    startTime?: Date;
    endTime?: Date;
}

/**
 * What the workers need from the network: the resource length and a stream of
 * opaque chunks for a byte range.
 */
export interface RangeTransport {
    getContentLength(url: string, signal?: AbortSignal): Promise<number>;
    streamRange(url: string, range: ByteRange, signal?: AbortSignal): AsyncIterable<Buffer>;
}

export enum DownloadEventName {
    Start = "start",
    Progress = "progress",
    SegmentSplit = "segmentSplit",
    SegmentClosed = "segmentClosed",
    SegmentRetry = "segmentRetry",
    Complete = "complete",
    Failed = "failed",
    Cancel = "cancel",
}

export interface DownloadEventMap {
    [DownloadEventName.Start]: (info: DownloadTaskInfo) => void;
    [DownloadEventName.Progress]: (info: DownloadTaskInfo, progress: DownloadProgress) => void;
    [DownloadEventName.SegmentSplit]: (
        info: DownloadTaskInfo,
        donor: SegmentInfo,
        receiver: SegmentInfo
    ) => void;
    [DownloadEventName.SegmentClosed]: (info: DownloadTaskInfo, segment: SegmentInfo) => void;
    [DownloadEventName.SegmentRetry]: (
        info: DownloadTaskInfo,
        segment: SegmentInfo,
        error: Error,
        attempt: number
    ) => void;
    [DownloadEventName.Complete]: (info: DownloadTaskInfo) => void;
    [DownloadEventName.Failed]: (info: DownloadTaskInfo, error: Error) => void;
    [DownloadEventName.Cancel]: (info: DownloadTaskInfo) => void;
}
