import { mkdir, open, rename, stat, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * One segment's view of the staging file: positioned writes through its own
 * descriptor.
 */
export interface SegmentHandle {
    write(position: number, data: Buffer): Promise<void>;
    close(): Promise<void>;
}

class FileSegmentHandle implements SegmentHandle {
    constructor(private fileHandle: FileHandle | null) {}

    async write(position: number, data: Buffer): Promise<void> {
        if (!this.fileHandle) throw new Error("File not open");

        let written = 0;
        while (written < data.length) {
            const { bytesWritten } = await this.fileHandle.write(
                data,
                written,
                data.length - written,
                position + written
            );
            written += bytesWritten;
        }
    }

    async close(): Promise<void> {
        if (this.fileHandle) {
            const handle = this.fileHandle;
            this.fileHandle = null;
            await handle.close();
        }
    }
}

/**
 * The in-progress output file. It is created and sized exactly once; segments
 * then open it read/write without truncation, so no open erases another
 * segment's bytes.
 */
export class StagingFile {
    private constructor(
        public readonly path: string,
        public readonly size: number
    ) {}

    static async create(filePath: string, size: number): Promise<StagingFile> {
        await mkdir(dirname(filePath), { recursive: true });

        const fileHandle = await open(filePath, "w");
        try {
            await fileHandle.truncate(size);
        } finally {
            await fileHandle.close();
        }

        return new StagingFile(filePath, size);
    }

    async openHandle(): Promise<SegmentHandle> {
        return new FileSegmentHandle(await open(this.path, "r+"));
    }

    /**
     * Open one handle per segment; handles already opened are closed again if a
     * later open fails
     */
    async openHandles(count: number): Promise<SegmentHandle[]> {
        const handles: SegmentHandle[] = [];
        try {
            for (let i = 0; i < count; i++) handles.push(await this.openHandle());
        } catch (error) {
            await Promise.allSettled(handles.map(handle => handle.close()));
            throw error;
        }
        return handles;
    }

    /**
     * Atomically move the finished file to its final name
     */
    async commit(outputPath: string): Promise<void> {
        await mkdir(dirname(outputPath), { recursive: true });
        await rename(this.path, outputPath);
    }

    /**
     * Check if file exists and get size
     */
    static async exists(filePath: string): Promise<{ exists: boolean; size: number }> {
        return stat(filePath)
            .then(stats => ({ exists: true, size: stats.size }))
            .catch(() => ({ exists: false, size: 0 }));
    }
}
