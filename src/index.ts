export { Downloader, DownloadCoordinator, SegmentStore, computeStops } from "@/core";
export { HttpClient } from "@/network";
export { DownloadEventName } from "@/types";
export type {
    ByteRange,
    DownloaderOptions,
    DownloadOptions,
    DownloadTaskInfo,
    DownloadProgress,
    DownloadStatus,
    RangeTransport,
    SegmentInfo,
} from "@/types";
