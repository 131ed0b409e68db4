import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DownloadCoordinator, Downloader } from "@/core";
import { StagingFile } from "@/storage";
import { DownloadEventName } from "@/types";
import type { DownloaderOptions, RangeTransport, SegmentInfo } from "@/types";
import { createPayload, MemoryTransport } from "../helpers/MemoryTransport";

const TEST_URL = "http://example.test/files/payload.bin";

describe("DownloadCoordinator", () => {
    let testDir = "";

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), "splitfetch-coordinator-"));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    function createTask(transport: MemoryTransport, options: DownloaderOptions = {}) {
        return new DownloadCoordinator(
            { outputDirectory: testDir, retryDelay: 0, progressInterval: 0, ...options },
            "test-task",
            transport
        );
    }

    test("splits the slow segment when the fast one runs dry", async () => {
        const payload = createPayload(64 * 1024);
        const transport = new MemoryTransport(payload, range =>
            range.start === 0 ? { chunkSize: 512, delayMs: 5 } : { chunkSize: 64 * 1024 }
        );
        const task = createTask(transport, { connections: 2, splitThreshold: 1024 });
        const splits: Array<{ donor: SegmentInfo; receiver: SegmentInfo }> = [];
        task.on(DownloadEventName.SegmentSplit, (_info, donor, receiver) => {
            splits.push({ donor, receiver });
        });

        const info = await task.start({ url: TEST_URL });

        expect(splits.length).toBeGreaterThan(0);
        const [first] = splits;
        expect(first?.donor.index).toBe(0);
        expect(first?.receiver.index).toBe(1);
        expect(first?.receiver.end).toBe(32 * 1024);
        expect(first?.receiver.start).toBe(first?.donor.end);

        expect(info.status).toBe("completed");
        expect(info.outputPath).toBe(join(testDir, "payload.bin"));
        expect(info.downloadedBytes).toBe(payload.length);
        expect(info.activeConnections).toBe(0);
        expect((await readFile(info.outputPath)).equals(payload)).toBe(true);
        expect((await StagingFile.exists(info.stagingPath)).exists).toBe(false);
    });

    test("retries a range whose connection closes early", async () => {
        const payload = createPayload(10_000);
        const transport = new MemoryTransport(payload, (_range, request) =>
            request === 1 ? { chunkSize: 1000, cutAfter: 4000 } : { chunkSize: 1000 }
        );
        const task = createTask(transport, { connections: 1 });
        const retries: Array<{ attempt: number; message: string }> = [];
        task.on(DownloadEventName.SegmentRetry, (_info, _segment, error, attempt) => {
            retries.push({ attempt, message: error.message });
        });

        const info = await task.start({ url: TEST_URL, filename: "retried.bin" });

        expect(retries).toEqual([
            { attempt: 1, message: "Connection closed at byte 4000 before reaching 10000" },
        ]);
        expect(transport.requests).toEqual([
            { start: 0, end: 10_000 },
            { start: 4000, end: 10_000 },
        ]);
        expect((await readFile(info.outputPath)).equals(payload)).toBe(true);
    });

    test("fails after retries without progress and leaves the staging file", async () => {
        const transport = new MemoryTransport(createPayload(5000), () => ({
            chunkSize: 1000,
            cutAfter: 0,
        }));
        const task = createTask(transport, { connections: 1, retries: 2 });
        const failures: Error[] = [];
        let retryEvents = 0;
        task.on(DownloadEventName.Failed, (_info, error) => failures.push(error));
        task.on(DownloadEventName.SegmentRetry, () => retryEvents++);

        await expect(task.start({ url: TEST_URL })).rejects.toThrow(
            "Segment 0 gave up at byte 0 after 2 retries: Connection closed at byte 0 before reaching 5000"
        );

        expect(transport.requests).toHaveLength(3);
        expect(retryEvents).toBe(2);
        expect(failures).toHaveLength(1);
        expect(task.info.status).toBe("failed");
        expect(await StagingFile.exists(task.info.stagingPath)).toEqual({ exists: true, size: 5000 });
        expect((await StagingFile.exists(task.info.outputPath)).exists).toBe(false);
    });

    test("completes an empty resource without issuing range requests", async () => {
        const transport = new MemoryTransport(Buffer.alloc(0));
        const task = createTask(transport);
        let closed = 0;
        task.on(DownloadEventName.SegmentClosed, () => closed++);

        const info = await task.start({ url: TEST_URL });

        expect(transport.requests).toEqual([]);
        expect(closed).toBe(4);
        expect(info.status).toBe("completed");
        expect(await StagingFile.exists(info.outputPath)).toEqual({ exists: true, size: 0 });
    });

    test("names the output after the decoded basename inside the output directory", async () => {
        const payload = createPayload(3000);
        const task = createTask(new MemoryTransport(payload), { connections: 2 });

        const info = await task.start({ url: "http://example.test/x%2F..%2F..%2Fescaped.bin" });

        expect(info.filename).toBe("escaped.bin");
        expect(info.outputPath).toBe(join(testDir, "escaped.bin"));
        expect((await readFile(info.outputPath)).equals(payload)).toBe(true);
    });

    test("rejects URLs it cannot fetch before touching the disk", async () => {
        const task = createTask(new MemoryTransport(createPayload(10)));

        await expect(task.start({ url: "ftp://example.test/file.bin" })).rejects.toThrow(
            "Unsupported protocol ftp: in ftp://example.test/file.bin"
        );
        expect(task.info.status).toBe("failed");
        expect(task.info.stagingPath).toBe("");
    });

    test("cancels without renaming the staging file", async () => {
        const transport = new MemoryTransport(createPayload(2048));
        const task = createTask(transport);
        let failed = 0;
        let cancelled = 0;
        task.on(DownloadEventName.Failed, () => failed++);
        task.on(DownloadEventName.Cancel, () => cancelled++);
        task.on(DownloadEventName.Start, () => task.cancel());

        await expect(task.start({ url: TEST_URL })).rejects.toThrow("Download cancelled");

        expect(task.info.status).toBe("cancelled");
        expect(cancelled).toBe(1);
        expect(failed).toBe(0);
        expect(transport.requests).toEqual([]);
        expect((await StagingFile.exists(task.info.stagingPath)).exists).toBe(true);
        expect((await StagingFile.exists(task.info.outputPath)).exists).toBe(false);
    });
});

describe("Downloader", () => {
    let testDir = "";

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), "splitfetch-downloader-"));
    });

    afterEach(async () => {
        await rm(testDir, { recursive: true, force: true });
    });

    test("rejects invalid options up front", () => {
        expect(() => new Downloader({ connections: 0 })).toThrow(/Connection count/);
    });

    test("queues downloads and forwards their events", async () => {
        const payload = createPayload(20_000);
        const downloader = new Downloader(
            { outputDirectory: testDir, progressInterval: 0, retryDelay: 0 },
            new MemoryTransport(payload)
        );
        const completed: string[] = [];
        downloader.on(DownloadEventName.Complete, info => completed.push(info.filename));

        const first = downloader.download({ url: "http://example.test/a.bin" });
        const second = downloader.download({ url: "http://example.test/b.bin" });
        expect(downloader.getActiveTasks()).toHaveLength(2);

        await downloader.waitForAll();
        await Promise.all([first.completionPromise, second.completionPromise]);

        expect(completed).toEqual(["a.bin", "b.bin"]);
        expect(downloader.getActiveTasks()).toEqual([]);
        expect((await readFile(join(testDir, "a.bin"))).equals(payload)).toBe(true);
        expect((await readFile(join(testDir, "b.bin"))).equals(payload)).toBe(true);
    });

    test("gives concurrent downloads with the same basename separate files", async () => {
        const payloads = new Map([
            ["http://a.test/f.bin", Buffer.alloc(30_000, 0xaa)],
            ["http://b.test/f.bin", Buffer.alloc(30_000, 0xbb)],
        ]);
        const transports = new Map(
            [...payloads].map(([url, payload]): [string, MemoryTransport] => [
                url,
                new MemoryTransport(payload, () => ({ chunkSize: 1000, delayMs: 1 })),
            ])
        );
        const route = (url: string): MemoryTransport => {
            const transport = transports.get(url);
            if (!transport) throw new Error(`No transport for ${url}`);
            return transport;
        };
        const transport: RangeTransport = {
            getContentLength: url => route(url).getContentLength(),
            streamRange: (url, range, signal) => route(url).streamRange(url, range, signal),
        };
        const downloader = new Downloader(
            {
                outputDirectory: testDir,
                maxConcurrentDownloads: 2,
                progressInterval: 0,
                retryDelay: 0,
            },
            transport
        );

        const first = downloader.download({ url: "http://a.test/f.bin" });
        const second = downloader.download({ url: "http://b.test/f.bin" });
        await Promise.all([first.completionPromise, second.completionPromise]);

        expect([first.info.status, second.info.status]).toEqual(["completed", "completed"]);
        expect(new Set([first.info.outputPath, second.info.outputPath])).toEqual(
            new Set([join(testDir, "f.bin"), join(testDir, "f.1.bin")])
        );
        for (const task of [first, second]) {
            const expected = payloads.get(task.info.url);
            expect((await readFile(task.info.outputPath)).equals(expected ?? Buffer.alloc(0))).toBe(
                true
            );
            expect((await StagingFile.exists(task.info.stagingPath)).exists).toBe(false);
        }
    });

    test("resolves with the failed task info instead of rejecting", async () => {
        const downloader = new Downloader(
            { outputDirectory: testDir, progressInterval: 0 },
            new MemoryTransport(createPayload(10))
        );
        const errors: string[] = [];
        downloader.on(DownloadEventName.Failed, (_info, error) => errors.push(error.message));

        const info = await downloader.downloadAndWait({ url: "not a url" });

        expect(info.status).toBe("failed");
        expect(errors).toEqual(["Invalid URL: not a url"]);
    });
});
