import nodeFetch, { RequestInit, Response } from 'node-fetch';
import * as http from 'http';
import * as https from 'https';
import { Readable } from 'stream';
import { ILogger } from '../../shared/logging/Logger';
import { InternalError, errorMessage } from '../../shared/errors/AppError';

export type FetchImplementation = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
    /**
     * Milliseconds to wait for response headers. 0 disables the limit.
     */
    timeout?: number;
    maxRedirects?: number;
    keepAlive?: boolean;
    fetch?: FetchImplementation;
}

/**
 * `headers` stops at the response headers and abandons the body;
 * `body` hands the open response body to the caller.
 */
export type AttemptMode = 'headers' | 'body';

export type AttemptOutcome =
    | {
          ok: true;
          identity: string;
          response: Response;
          /**
           * Abort the request and discard whatever is left of the body
           */
          release: () => void;
      }
    | { ok: false; identity: string; status: number; reason: string };

/**
 * Network client owning one keep-alive connection pool. Construct it once per
 * batch and dispose it when the batch ends; `HttpClient.use` does both.
 */
export class HttpClient {
    private readonly config: Required<Omit<HttpClientConfig, 'fetch'>>;
    private readonly fetchImpl: FetchImplementation;
    private readonly httpAgent: http.Agent;
    private readonly httpsAgent: https.Agent;
    private disposed = false;

    constructor(
        private readonly logger: ILogger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            timeout: config.timeout ?? 30000,
            maxRedirects: config.maxRedirects ?? 20,
            keepAlive: config.keepAlive ?? true
        };
        this.fetchImpl = config.fetch ?? nodeFetch;
        this.httpAgent = new http.Agent({ keepAlive: this.config.keepAlive });
        this.httpsAgent = new https.Agent({ keepAlive: this.config.keepAlive });
    }

    /**
     * Run `fn` with a fresh client, disposing it on every exit path
     */
    static async use<T>(
        logger: ILogger,
        config: HttpClientConfig,
        fn: (client: HttpClient) => Promise<T>
    ): Promise<T> {
        const client = new HttpClient(logger, config);
        try {
            return await fn(client);
        } finally {
            client.dispose();
        }
    }

    /**
     * One GET with one identity. Builds its own headers; nothing carries over
     * to the next call. Transport failures come back as status 0.
     */
    async attempt(
        uri: string,
        identity: string,
        headers: Readonly<Record<string, string>>,
        mode: AttemptMode
    ): Promise<AttemptOutcome> {
        this.assertUsable();

        const controller = new AbortController();
        const timeoutId = this.config.timeout > 0
            ? setTimeout(() => controller.abort(), this.config.timeout)
            : undefined;

        const requestOptions: RequestInit = {
            method: 'GET',
            headers: this.buildHeaders(identity, headers),
            redirect: 'follow',
            follow: this.config.maxRedirects,
            compress: true,
            agent: (parsedUrl: URL) => parsedUrl.protocol === 'http:' ? this.httpAgent : this.httpsAgent,
            signal: controller.signal
        };

        this.logger.debug(`HTTP GET ${uri} (${mode}, identity: ${describeIdentity(identity)})`);

        let response: Response;
        try {
            response = await this.fetchImpl(uri, requestOptions);
        } catch (error) {
            const reason = controller.signal.aborted
                ? `No response within ${this.config.timeout}ms`
                : errorMessage(error);
            this.logger.debug(`HTTP GET ${uri} failed: ${reason}`);
            return { ok: false, identity, status: 0, reason };
        } finally {
            clearTimeout(timeoutId);
        }

        this.logger.debug(`HTTP ${response.status} ${response.statusText} <- ${response.url || uri}`);

        if (!response.ok) {
            this.abandonBody(response, controller);
            return { ok: false, identity, status: response.status, reason: response.statusText };
        }

        let released = false;
        const release = (): void => {
            if (!released) {
                released = true;
                this.abandonBody(response, controller);
            }
        };

        if (mode === 'headers') {
            release();
        }

        return { ok: true, identity, response, release };
    }

    /**
     * Try each identity in order and stop at the first success. An empty list
     * is tried as a single attempt without identity.
     */
    async firstSuccessful(
        uri: string,
        identities: readonly string[],
        headers: Readonly<Record<string, string>>,
        mode: AttemptMode
    ): Promise<AttemptOutcome> {
        const candidates = identities.length > 0 ? identities : [''];
        let last: AttemptOutcome | undefined;

        for (const identity of candidates) {
            last = await this.attempt(uri, identity, headers, mode);
            if (last.ok) {
                return last;
            }
            this.logger.debug(
                `Identity ${describeIdentity(identity)} rejected for ${uri}: ${last.status} ${last.reason}`
            );
        }

        if (!last) {
            throw new InternalError('No identity candidate was attempted');
        }
        return last;
    }

    /**
     * Release pooled connections. Further attempts are rejected.
     */
    dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
        this.logger.debug('HTTP client disposed');
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    private buildHeaders(
        identity: string,
        headers: Readonly<Record<string, string>>
    ): Record<string, string> {
        const built: Record<string, string> = {};

        Object.entries(headers).forEach(([key, value]) => {
            if (key.toLowerCase() !== 'user-agent') {
                built[key] = value;
            }
        });

        // node-fetch adds its own User-Agent when none is set; an empty value
        // is the closest the transport gets to sending no identity.
        built['User-Agent'] = identity;

        return built;
    }

    private abandonBody(response: Response, controller: AbortController): void {
        const body: NodeJS.ReadableStream | null = response.body;
        if (body) {
            body.on('error', (error: Error) => {
                this.logger.debug(`Discarded response body: ${error.message}`);
            });
        }
        controller.abort();
        if (body instanceof Readable && !body.destroyed) {
            body.destroy();
        }
    }

    private assertUsable(): void {
        if (this.disposed) {
            throw new InternalError('HTTP client used after dispose');
        }
    }
}

function describeIdentity(identity: string): string {
    return identity === '' ? '<none>' : `"${identity}"`;
}
