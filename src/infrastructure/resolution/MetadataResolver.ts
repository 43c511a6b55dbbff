import { Response } from 'node-fetch';
import { IMetadataResolver, ResolveOptions } from '../../domain/interfaces/IMetadataResolver';
import { ResolvedResource } from '../../domain/entities/ResolvedResource';
import { deriveFileName } from '../../domain/value-objects/Filename';
import { HttpClient } from '../http/HttpClient';
import { parseContentLength, parseHttpDate } from '../http/headers';
import { ResolutionError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

/**
 * Learns a resource's effective URL, name, size and date from a headers-only GET.
 * HEAD is avoided on purpose: some servers reject it.
 */
export class MetadataResolver implements IMetadataResolver {
    constructor(
        private readonly client: HttpClient,
        private readonly logger: ILogger
    ) {}

    async resolve(
        uri: string,
        identityCandidates: readonly string[],
        extraHeaders: Readonly<Record<string, string>>,
        options: ResolveOptions = {}
    ): Promise<ResolvedResource> {
        const outcome = await this.client.firstSuccessful(uri, identityCandidates, extraHeaders, 'headers');

        if (!outcome.ok) {
            throw new ResolutionError(uri, outcome.status, outcome.reason);
        }

        const resource = MetadataResolver.fromResponse(uri, outcome.response, options);

        this.logger.debug(`Resolved ${uri}`, {
            identity: outcome.identity || '<none>',
            ...resource.toJSON()
        });

        return resource;
    }

    /**
     * Build the resource description from a successful response. Missing or
     * malformed metadata leaves the matching field unset.
     */
    static fromResponse(uri: string, response: Response, options: ResolveOptions = {}): ResolvedResource {
        const absoluteUri = response.url || uri;
        const headers = response.headers;

        return new ResolvedResource({
            originalUri: uri,
            absoluteUri,
            fileName: deriveFileName({
                explicitFileName: options.explicitFileName,
                contentDisposition: headers.get('content-disposition'),
                effectiveUri: absoluteUri,
                originalUri: uri
            }),
            fileSizeBytes: parseContentLength(headers.get('content-length')),
            lastModified: parseHttpDate(headers.get('last-modified'))
        });
    }
}
