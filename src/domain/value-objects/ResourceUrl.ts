import { ValidationError } from '../../shared/errors/AppError';

/**
 * Value object representing a downloadable http(s) URL
 */
export class ResourceUrl {
  private static readonly SUPPORTED_PROTOCOLS = ['http:', 'https:'];

  private readonly url: URL;

  constructor(url: string) {
    const trimmed = url.trim();

    try {
      this.url = new URL(trimmed);
    } catch {
      throw new ValidationError(`Invalid URL: ${url}`, { url });
    }

    if (!ResourceUrl.SUPPORTED_PROTOCOLS.includes(this.url.protocol)) {
      throw new ValidationError(
        `Unsupported protocol ${this.url.protocol} in ${url}; only http and https are supported`,
        { url }
      );
    }
  }

  /**
   * Get the normalized URL string
   */
  toString(): string {
    return this.url.toString();
  }
}
