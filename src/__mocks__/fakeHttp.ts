import { Readable } from 'stream';
import { Headers, RequestInit, Response } from 'node-fetch';
import { FetchImplementation } from '../infrastructure/http/HttpClient';

/**
 * A request as seen by the fake transport
 */
export interface RecordedRequest {
    url: string;
    method: string;
    headers: Headers;
    userAgent: string | null;
    signal?: RequestInit['signal'];
}

export interface FakeReply {
    status?: number;
    statusText?: string;
    headers?: Record<string, string>;
    /**
     * Chunks of the body, or a ready-made stream
     */
    body?: Array<string | Buffer> | Readable;
    /**
     * Effective URL, as after following redirects
     */
    url?: string;
}

export type FakeHandler = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

/**
 * In-process stand-in for the network. Answers every fetch through `handler`
 * with a real node-fetch Response and records what was asked.
 */
export class FakeHttp {
    readonly requests: RecordedRequest[] = [];

    constructor(private readonly handler: FakeHandler) {}

    readonly fetch: FetchImplementation = async (url: string, init?: RequestInit): Promise<Response> => {
        const headers = new Headers(init?.headers);
        const request: RecordedRequest = {
            url,
            method: init?.method ?? 'GET',
            headers,
            userAgent: headers.get('user-agent'),
            signal: init?.signal
        };
        this.requests.push(request);

        const reply = await this.handler(request);
        const body = reply.body instanceof Readable ? reply.body : Readable.from(toBuffers(reply.body ?? []));

        return new Response(body, {
            url: reply.url ?? url,
            status: reply.status ?? 200,
            statusText: reply.statusText ?? 'OK',
            headers: reply.headers ?? {}
        });
    };

    get userAgents(): Array<string | null> {
        return this.requests.map(request => request.userAgent);
    }
}

// node-fetch only reads Buffer chunks
function toBuffers(chunks: Array<string | Buffer>): Buffer[] {
    return chunks.map(chunk => typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
}

/**
 * Emits `chunks` one read at a time, then fails with `error` when asked for more
 */
export function failingBody(chunks: Array<string | Buffer>, error: Error): Readable {
    const pending = [...chunks];
    return new Readable({
        highWaterMark: 0,
        read() {
            const next = pending.shift();
            if (next === undefined) {
                this.destroy(error);
            } else {
                this.push(next);
            }
        }
    });
}
