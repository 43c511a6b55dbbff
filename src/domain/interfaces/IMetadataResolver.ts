import { ResolvedResource } from '../entities/ResolvedResource';

/**
 * Resolves what a URL points at without downloading it
 */
export interface IMetadataResolver {
  /**
   * Headers-only fetch, trying each identity candidate in order.
   * Rejects with ResolutionError when none gets a success status.
   */
  resolve(
    uri: string,
    identityCandidates: readonly string[],
    extraHeaders: Readonly<Record<string, string>>,
    options?: ResolveOptions
  ): Promise<ResolvedResource>;
}

export interface ResolveOptions {
  /**
   * Takes priority over every header or URL derived name
   */
  explicitFileName?: string;
}
