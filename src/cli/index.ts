#!/usr/bin/env node

import { basename, resolve } from "node:path";
import { Downloader } from "@/core";
import { numberedCandidates, StagingFile, stagingPathFor } from "@/storage";
import { DownloadEventName } from "@/types";
import type { DownloadProgress, DownloadTaskInfo, SegmentInfo } from "@/types";
import { log, parseLogLevel } from "@/utils/logger";
import { extractFilename, formatBytes, formatDuration } from "@/utils/common";
import { GID_LENGTH, GID_PREFIX } from "@/utils/constants";
import { Command } from "commander";

interface CliOptions {
    numConnections: string;
    output: string;
    filename?: string;
    splitThreshold: string;
    retries: string;
    retryDelay: string;
    timeout: string;
    progressInterval: string;
    maxConcurrentDownloads: string;
    logLevel: string;
    verbose?: boolean;
}

function parseNumberOption(value: string, optionName: string, min = 1): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed < min || String(parsed) !== value.trim()) {
        throw new Error(`Invalid value for ${optionName}: ${value}`);
    }
    return parsed;
}

/**
 * `name.ext`, or the first `name.N.ext` that no file, leftover staging file or
 * earlier URL of this run already uses. The pick is added to `taken`.
 */
async function findAvailableFilename(filePath: string, taken: Set<string>): Promise<string> {
    const candidates = numberedCandidates(resolve(filePath));
    for (;;) {
        const candidate = candidates.next().value;
        if (taken.has(candidate)) continue;
        if ((await StagingFile.exists(candidate)).exists) continue;
        if ((await StagingFile.exists(stagingPathFor(candidate))).exists) continue;

        taken.add(candidate);
        return basename(candidate);
    }
}

function generateGID(): string {
    return (
        GID_PREFIX +
        Math.random()
            .toString(16)
            .slice(2, 2 + GID_LENGTH)
    );
}

const program = new Command();

program
    .name("splitfetch")
    .description(
        "Parallel-segment downloader that splits the busiest segment when a connection frees up"
    )
    .version("0.1.0")
    .argument("<urls...>", "URL(s) to download")
    .option("-k, --num-connections <number>", "Number of segments/connections per download", "4")
    .option("-o, --output <dir>", "Output directory", ".")
    .option("-f, --filename <name>", "Output filename (single URL only)")
    .option(
        "-t, --split-threshold <size>",
        "Smallest remaining size worth splitting (e.g., 8KB, 1MB)",
        "8KB"
    )
    .option(
        "-r, --retries <number>",
        "Retries in a row without progress before a segment fails",
        "3"
    )
    .option("--retry-delay <ms>", "Delay before a segment retries its range", "1000")
    .option("--timeout <ms>", "Idle socket timeout", "30000")
    .option("--progress-interval <seconds>", "Seconds between progress samples", "3")
    .option("-j, --max-concurrent-downloads <number>", "Downloads running at the same time", "1")
    .option("--log-level <level>", "Set log level (debug, info, warn, error, silent)", "info")
    .option("-v, --verbose", "Alias for --log-level debug")
    .action(async (urls: string[], options: CliOptions) => {
        log.setLevel(parseLogLevel(options.verbose ? "debug" : options.logLevel));

        log.debug(`URLs: ${urls.join(", ")}`);
        log.debug(`Options: ${JSON.stringify(options)}`);

        if (options.filename && urls.length > 1)
            throw new Error("--filename can only be used with a single URL");

        const downloader = new Downloader({
            connections: parseNumberOption(options.numConnections, "--num-connections"),
            splitThreshold: options.splitThreshold,
            retries: parseNumberOption(options.retries, "--retries", 0),
            retryDelay: parseNumberOption(options.retryDelay, "--retry-delay", 0),
            timeout: parseNumberOption(options.timeout, "--timeout"),
            progressInterval:
                parseNumberOption(options.progressInterval, "--progress-interval") * 1000,
            maxConcurrentDownloads: parseNumberOption(
                options.maxConcurrentDownloads,
                "--max-concurrent-downloads"
            ),
            outputDirectory: options.output,
        });

        const gids = new Map<string, string>();
        let failures = 0;
        let shuttingDown = false;

        const gidOf = (info: DownloadTaskInfo): string =>
            gids.get(info.id) ?? GID_PREFIX + info.id.slice(0, GID_LENGTH);

        downloader.on(DownloadEventName.Start, info => {
            log.info(
                `GID${gidOf(info)} ${info.url}: ${formatBytes(info.totalSize)} in ${info.segments.length} segment(s) -> ${info.stagingPath}`
            );
        });

        const progressHandler = (info: DownloadTaskInfo, progress: DownloadProgress) => {
            if (shuttingDown) return;

            log.progress({
                gid: gidOf(info),
                percent: progress.percent,
                speedText: `${progress.speed.toFixed(2)}KB/s`,
                connections: info.activeConnections,
                etaText: formatDuration(progress.eta),
            });
        };

        const splitHandler = (
            _info: DownloadTaskInfo,
            donor: SegmentInfo,
            receiver: SegmentInfo
        ) => {
            log.debug(
                `Segment ${receiver.index} took [${receiver.start}, ${receiver.end}) from segment ${donor.index}`
            );
        };

        downloader.on(DownloadEventName.Progress, progressHandler);
        downloader.on(DownloadEventName.SegmentSplit, splitHandler);

        downloader.on(DownloadEventName.SegmentClosed, (_info, segment) => {
            log.debug(`Segment ${segment.index} closed`);
        });

        downloader.on(DownloadEventName.SegmentRetry, (_info, segment, error, attempt) => {
            if (!shuttingDown)
                log.warn(`Segment ${segment.index} retry #${attempt}: ${error.message}`);
        });

        downloader.on(DownloadEventName.Complete, info => {
            log.stopProgress();

            const elapsed =
                info.startTime && info.endTime
                    ? (info.endTime.getTime() - info.startTime.getTime()) / 1000
                    : 0;
            const avgSpeed = elapsed > 0 ? formatBytes(info.totalSize / elapsed) + "/s" : "--";

            log.success(
                `Download complete: ${formatBytes(info.totalSize)} in ${formatDuration(elapsed)} (${avgSpeed})`
            );
            log.info(`Saved to: ${info.outputPath}`);
        });

        downloader.on(DownloadEventName.Failed, (info, error) => {
            failures++;
            log.stopProgress();
            log.error(`GID${gidOf(info)} ${info.url}: ${error.message}`);
            if (info.stagingPath) log.info(`Partial data left in ${info.stagingPath}`);
        });

        downloader.on(DownloadEventName.Cancel, info => {
            log.info(`Download GID${gidOf(info)} not complete: ${info.stagingPath || info.url}`);
        });

        const shutdownHandler = () => {
            if (shuttingDown) return;
            shuttingDown = true;

            log.stopProgress();
            log.info("Shutdown sequence commencing...");
            downloader.cancelAll();
            process.exitCode = 1;
        };

        process.on("SIGINT", shutdownHandler);

        try {
            const tasks: Array<Promise<DownloadTaskInfo> | undefined> = [];
            const takenPaths = new Set<string>();
            for (const url of urls) {
                let filename = options.filename || extractFilename(url);

                if (!options.filename) {
                    const outputPath = resolve(options.output, filename);
                    const available = await findAvailableFilename(outputPath, takenPaths);
                    if (available !== filename) {
                        log.info(
                            `Name already in use. Renamed to ${resolve(options.output, available)}.`
                        );
                    }
                    filename = available;
                }

                const task = downloader.download({ url, filename, outputDir: options.output });
                gids.set(task.id, generateGID());
                tasks.push(task.completionPromise);
            }

            await Promise.all(tasks);
        } finally {
            process.off("SIGINT", shutdownHandler);
        }

        if (failures > 0) process.exitCode = 1;
    });

program.parseAsync().catch((error: unknown) => {
    log.stopProgress();
    log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
