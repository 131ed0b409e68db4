import { join, parse, resolve } from "node:path";
import { STAGING_FILE_EXTENSION } from "@/utils/constants";

/**
 * `name.ext`, `name.1.ext`, `name.2.ext`, ...
 */
export function* numberedCandidates(filePath: string): Generator<string, never> {
    const { dir, name, ext } = parse(filePath);
    yield filePath;
    for (let counter = 1; ; counter++) yield join(dir, `${name}.${counter}${ext}`);
}

/**
 * Output paths claimed by the jobs of one downloader. A path stays claimed while
 * its job runs and after it completes, so no two jobs share a staging file or
 * rename onto each other's output. Failed or cancelled jobs give theirs back.
 */
export class OutputReservations {
    private readonly claimed = new Set<string>();

    /**
     * Claim `outputPath`, or the first numbered variant nobody holds. Returns the
     * claimed absolute path.
     */
    reserve(outputPath: string): string {
        const candidates = numberedCandidates(resolve(outputPath));
        let candidate = candidates.next().value;
        while (this.claimed.has(candidate)) candidate = candidates.next().value;

        this.claimed.add(candidate);
        return candidate;
    }

    release(outputPath: string): void {
        this.claimed.delete(resolve(outputPath));
    }

    has(outputPath: string): boolean {
        return this.claimed.has(resolve(outputPath));
    }
}

export function stagingPathFor(outputPath: string): string {
    return `${outputPath}${STAGING_FILE_EXTENSION}`;
}
