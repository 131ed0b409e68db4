import { basename, join } from "node:path";
import { mergeOptions, parseByteSize, validateOptions } from "@/config";
import { HttpClient } from "@/network";
import { OutputReservations, StagingFile, stagingPathFor } from "@/storage";
import { DownloadEventName } from "@/types";
import type {
    DownloaderOptions,
    DownloadEventMap,
    DownloadOptions,
    DownloadProgress,
    DownloadTaskInfo,
    RangeTransport,
} from "@/types";
import { TypedEventEmitter } from "@/utils/TypedEventEmitter";
import { extractFilename, toError } from "@/utils/common";
import { ProgressSampler } from "./ProgressSampler";
import type { Segment } from "./Segment";
import { SegmentStore } from "./SegmentStore";
import { SegmentWorker, type WorkerHooks } from "./SegmentWorker";

function emptyProgress(): DownloadProgress {
    return { totalBytes: 0, downloadedBytes: 0, percent: 0, speed: 0, eta: 0 };
}

function parseHttpUrl(url: string): URL {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new Error(`Invalid URL: ${url}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:")
        throw new Error(`Unsupported protocol ${parsed.protocol} in ${url}`);
    return parsed;
}

/**
 * One download: learns the length, partitions it, runs a worker per segment and
 * moves the staging file into place once every worker has closed its segment.
 */
export class DownloadCoordinator extends TypedEventEmitter<DownloadEventMap> {
    public id: string;
    public info: DownloadTaskInfo;
    public completionPromise?: Promise<DownloadTaskInfo>;

    private options: Required<DownloaderOptions>;
    private transport: RangeTransport;
    private reservations: OutputReservations;
    private reservedPath: string | null = null;
    private abortController = new AbortController();
    private store: SegmentStore | null = null;
    private sampler: ProgressSampler | null = null;
    private totalWritten = 0;
    private isCancelled = false;

    constructor(
        options: DownloaderOptions,
        id: string,
        transport?: RangeTransport,
        reservations?: OutputReservations
    ) {
        super();
        this.options = mergeOptions(options);
        this.id = id;
        this.reservations = reservations ?? new OutputReservations();

        this.transport =
            transport ??
            new HttpClient({
                timeout: this.options.timeout,
                connectTimeout: this.options.connectTimeout,
                retries: this.options.retries,
                headers: this.options.headers,
            });

        this.info = {
            id,
            url: "",
            filename: "",
            outputPath: "",
            stagingPath: "",
            totalSize: 0,
            downloadedBytes: 0,
            activeConnections: 0,
            segments: [],
            status: "pending",
            progress: emptyProgress(),
        };
    }

    async start(downloadOptions: DownloadOptions): Promise<DownloadTaskInfo> {
        try {
            validateOptions(this.options);
            const splitThreshold = parseByteSize(this.options.splitThreshold);

            this.info.status = "downloading";
            this.info.startTime = new Date();
            this.info.url = downloadOptions.url;

            const url = parseHttpUrl(downloadOptions.url).toString();
            const signal = this.abortController.signal;

            const totalSize = await this.transport.getContentLength(url, signal);
            this.info.totalSize = totalSize;
            // Claimed synchronously, so a concurrent job with the same name moves to name.N.ext
            this.reservedPath = this.reservations.reserve(
                join(
                    downloadOptions.outputDir ?? this.options.outputDirectory,
                    downloadOptions.filename || extractFilename(url)
                )
            );
            this.info.outputPath = this.reservedPath;
            this.info.filename = basename(this.reservedPath);
            this.info.stagingPath = stagingPathFor(this.reservedPath);

            const store = SegmentStore.partition(totalSize, this.options.connections, splitThreshold);
            this.store = store;

            const staging = await StagingFile.create(this.info.stagingPath, totalSize);
            const handles = await staging.openHandles(store.segments.length);
            this.refreshInfo();

            if (this.isCancelled) {
                await Promise.all(handles.map(handle => handle.close()));
                throw new Error("Download cancelled");
            }

            this.emit(DownloadEventName.Start, this.info);
            this.startSampler(totalSize);

            const hooks = this.createHooks();
            const runs = handles.map((handle, index) =>
                new SegmentWorker({
                    url,
                    index,
                    store,
                    transport: this.transport,
                    handle,
                    signal,
                    retries: this.options.retries,
                    retryDelay: this.options.retryDelay,
                    hooks,
                }).run()
            );

            try {
                await Promise.all(runs);
            } catch (error) {
                this.abortController.abort();
                await Promise.allSettled(runs);
                throw error;
            }

            if (this.isCancelled) throw new Error("Download cancelled");

            // Every worker returned without an abort, so each one closed its segment
            await store.drained;
            this.stopSampler(true);

            await staging.commit(this.info.outputPath);

            this.info.status = "completed";
            this.info.endTime = new Date();
            this.emit(DownloadEventName.Complete, this.info);
            return this.info;
        } catch (error) {
            this.stopSampler(false);
            const resolvedError = toError(error, "Download failed");
            this.info.error = resolvedError;
            this.info.endTime = new Date();
            this.refreshInfo();
            if (this.reservedPath) this.reservations.release(this.reservedPath);

            if (this.isCancelled) {
                this.info.status = "cancelled";
            } else {
                this.info.status = "failed";
                this.emit(DownloadEventName.Failed, this.info, resolvedError);
            }
            throw resolvedError;
        }
    }

    cancel(): void {
        if (this.isCancelled || this.info.status === "completed") return;

        this.isCancelled = true;
        this.abortController.abort();
        this.info.status = "cancelled";
        this.emit(DownloadEventName.Cancel, this.info);
    }

    private createHooks(): WorkerHooks {
        return {
            onWritten: bytes => {
                this.totalWritten += bytes;
            },
            onSplit: (donor: Segment, receiver: Segment) => {
                this.refreshInfo();
                this.emit(
                    DownloadEventName.SegmentSplit,
                    this.info,
                    donor.toJSON(),
                    receiver.toJSON()
                );
            },
            onClosed: (segment: Segment) => {
                this.refreshInfo();
                this.emit(DownloadEventName.SegmentClosed, this.info, segment.toJSON());
            },
            onRetry: (segment: Segment, error: Error, attempt: number) => {
                this.emit(
                    DownloadEventName.SegmentRetry,
                    this.info,
                    segment.toJSON(),
                    error,
                    attempt
                );
            },
        };
    }

    private startSampler(totalSize: number): void {
        this.sampler = new ProgressSampler({
            totalBytes: totalSize,
            intervalMs: this.options.progressInterval,
            read: () => this.totalWritten,
            onSample: progress => this.reportProgress(progress),
        });
        this.sampler.start();
    }

    private stopSampler(emitFinal: boolean): void {
        if (!this.sampler) return;

        this.sampler.stop();
        if (emitFinal) this.reportProgress(this.sampler.sample());
        this.sampler = null;
    }

    private reportProgress(progress: DownloadProgress): void {
        this.info.progress = progress;
        this.refreshInfo();
        this.emit(DownloadEventName.Progress, this.info, progress);
    }

    private refreshInfo(): void {
        this.info.downloadedBytes = this.totalWritten;
        if (this.store) {
            this.info.segments = this.store.snapshot();
            this.info.activeConnections = this.store.activeCount;
        }
    }
}
