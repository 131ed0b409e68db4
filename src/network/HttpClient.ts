import type { ByteRange, RangeTransport } from "@/types";
import got, { type Got, type PlainResponse } from "got";

interface HttpClientOptions {
    timeout: number;
    connectTimeout: number;
    retries: number;
    headers?: Record<string, string>;
}

/**
 * `Range` header for the half-open `[start, end)`; HTTP ranges are inclusive.
 */
export function formatRangeHeader(range: ByteRange): string {
    return `bytes=${range.start}-${range.end - 1}`;
}

export class HttpClient implements RangeTransport {
    private client: Got;
    private timeout: number;
    private connectTimeout: number;

    constructor(options: HttpClientOptions) {
        this.timeout = options.timeout;
        this.connectTimeout = options.connectTimeout;
        this.client = got.extend({
            retry: {
                limit: options.retries,
                methods: ["HEAD"],
            },
            timeout: {
                connect: options.connectTimeout,
            },
            headers: options.headers,
            followRedirect: false,
            decompress: false,
        });
    }

    async getContentLength(url: string, signal?: AbortSignal): Promise<number> {
        const response = await this.client.head(url, {
            signal,
            timeout: { connect: this.connectTimeout, request: this.timeout },
        });

        if (response.statusCode < 200 || response.statusCode >= 300) {
            throw new Error(
                `HEAD ${url} answered ${response.statusCode}; redirects are not followed`
            );
        }

        const contentLength = response.headers["content-length"];
        if (!contentLength) throw new Error(`Cannot find a Content-Length header for ${url}`);

        const length = Number(contentLength);
        if (!Number.isSafeInteger(length) || length < 0)
            throw new Error(`Invalid Content-Length header for ${url}: ${contentLength}`);

        return length;
    }

    /**
     * Stream `[start, end)`. Leaving the iteration early destroys the request.
     * A 200 is tolerated only for ranges starting at 0, where the full body
     * still lines up with the requested bytes.
     */
    async *streamRange(url: string, range: ByteRange, signal?: AbortSignal): AsyncGenerator<Buffer> {
        if (range.end <= range.start) return;

        const rangeHeader = formatRangeHeader(range);
        const stream = this.client.stream(url, {
            headers: { range: rangeHeader },
            signal,
            retry: { limit: 0 },
            timeout: { connect: this.connectTimeout, socket: this.timeout },
        });

        stream.once("response", (response: PlainResponse) => {
            if (response.statusCode === 206) return;
            if (response.statusCode === 200 && range.start === 0) return;
            stream.destroy(
                new Error(`Unexpected status ${response.statusCode} for ${rangeHeader} of ${url}`)
            );
        });

        for await (const chunk of stream) {
            yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        }
    }
}
