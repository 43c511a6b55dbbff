/**
 * Properties of a resolved remote resource
 */
export interface ResolvedResourceProps {
  originalUri: string;
  absoluteUri: string;
  fileName: string;
  fileSizeBytes?: number;
  lastModified?: Date;
}

/**
 * Normalized description of a remote resource, as learned from its response
 * headers. Immutable once constructed.
 */
export class ResolvedResource {
  readonly originalUri: string;
  readonly absoluteUri: string;
  /**
   * Sanitized name; empty when nothing could be derived
   */
  readonly fileName: string;
  /**
   * Server-declared length. Advisory only.
   */
  readonly fileSizeBytes?: number;
  readonly lastModified?: Date;

  constructor(props: ResolvedResourceProps) {
    this.originalUri = props.originalUri;
    this.absoluteUri = props.absoluteUri;
    this.fileName = props.fileName;
    this.fileSizeBytes = props.fileSizeBytes;
    this.lastModified = props.lastModified ? new Date(props.lastModified.getTime()) : undefined;
    Object.freeze(this);
  }

  get sizeKnown(): boolean {
    return this.fileSizeBytes !== undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      originalUri: this.originalUri,
      absoluteUri: this.absoluteUri,
      fileName: this.fileName,
      fileSizeBytes: this.fileSizeBytes ?? null,
      lastModified: this.lastModified?.toISOString() ?? null
    };
  }
}
