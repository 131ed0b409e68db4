export { Segment, type Claim } from "./Segment";
export { computeStops, partition } from "./partition";
export { SegmentStore, type RebalanceDecision } from "./SegmentStore";
export { SegmentWorker, type WorkerHooks, type SegmentWorkerOptions } from "./SegmentWorker";
export { ProgressSampler, type ProgressSamplerOptions } from "./ProgressSampler";
export { DownloadCoordinator } from "./DownloadCoordinator";
export { Downloader } from "./Downloader";
