import { randomUUID } from "node:crypto";
import { mergeOptions, validateOptions } from "@/config";
import { DownloadEventName } from "@/types";
import type {
    DownloaderOptions,
    DownloadEventMap,
    DownloadOptions,
    DownloadTaskInfo,
    RangeTransport,
} from "@/types";
import { OutputReservations } from "@/storage";
import { TypedEventEmitter } from "@/utils/TypedEventEmitter";
import PQueue from "p-queue";
import { DownloadCoordinator } from "./DownloadCoordinator";

const FORWARDED_EVENTS = Object.values(DownloadEventName);

/**
 * Queues downloads (one coordinator per URL) and re-emits their events.
 */
export class Downloader extends TypedEventEmitter<DownloadEventMap> {
    private options: Required<DownloaderOptions>;
    private downloadQueue: PQueue;
    private activeTasks: Map<string, DownloadCoordinator> = new Map();
    private reservations = new OutputReservations();

    constructor(
        options?: DownloaderOptions,
        private readonly transport?: RangeTransport
    ) {
        super();
        this.options = mergeOptions(options);
        validateOptions(this.options);

        this.downloadQueue = new PQueue({
            concurrency: this.options.maxConcurrentDownloads,
        });
    }

    download(options: DownloadOptions): DownloadCoordinator {
        const id = randomUUID();
        const task = new DownloadCoordinator(
            this.options,
            id,
            this.transport,
            this.reservations
        );

        task.forward(this, FORWARDED_EVENTS);
        this.activeTasks.set(id, task);

        task.completionPromise = this.downloadQueue.add(
            () =>
                task
                    .start(options)
                    .catch(() => {
                        // Already reported through the failed/cancel events and task.info
                        return task.info;
                    })
                    .finally(() => this.activeTasks.delete(id)),
            { throwOnTimeout: true }
        );

        return task;
    }

    async downloadAndWait(options: DownloadOptions): Promise<DownloadTaskInfo> {
        const task = this.download(options);
        await task.completionPromise;
        return task.info;
    }

    cancel(taskId: string): boolean {
        const task = this.activeTasks.get(taskId);
        if (task) {
            task.cancel();
            this.activeTasks.delete(taskId);
            return true;
        }
        return false;
    }

    cancelAll(): void {
        for (const task of this.activeTasks.values()) {
            task.cancel();
        }
        this.activeTasks.clear();
    }

    getActiveTasks(): DownloadTaskInfo[] {
        return Array.from(this.activeTasks.values()).map(task => task.info);
    }

    getTask(taskId: string): DownloadTaskInfo | undefined {
        return this.activeTasks.get(taskId)?.info;
    }

    async waitForAll(): Promise<void> {
        await this.downloadQueue.onIdle();
    }
}
