/**
 * Platform marker flagging a file as downloaded from an untrusted origin
 */
export interface IProvenanceMarker {
  readonly platform: string;
  mark(filePath: string): Promise<void>;
  /**
   * Remove any marker; a file without one is not an error
   */
  clear(filePath: string): Promise<void>;
}
