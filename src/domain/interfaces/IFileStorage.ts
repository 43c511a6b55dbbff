import { FileHandle } from 'fs/promises';

/**
 * Filesystem operations behind a download
 */
export interface IFileStorage {
  exists(path: string): Promise<boolean>;

  /**
   * Create a directory and its parents. Rejects with DirectoryCreateError.
   */
  ensureDirectory(path: string): Promise<void>;

  /**
   * Create a uniquely named file for exclusive writing. Rejects with TempFileError.
   */
  createTempFile(directory: string): Promise<TempFile>;

  /**
   * Move a file into place, replacing the destination. Rejects with FinalizeError.
   */
  move(source: string, destination: string): Promise<void>;

  setModifiedTime(path: string, modifiedAt: Date): Promise<void>;

  /**
   * Delete a file; a missing file is not an error
   */
  remove(path: string): Promise<void>;

  getMetadata(path: string): Promise<FileMetadata>;

  /**
   * Temporary files left in a directory by earlier runs
   */
  listTempFiles(directory: string, options?: ListTempOptions): Promise<FileInfo[]>;
}

/**
 * An open temporary file
 */
export interface TempFile {
  path: string;
  handle: FileHandle;
}

/**
 * File metadata
 */
export interface FileMetadata {
  size: number;
  createdAt: Date;
  modifiedAt: Date;
}

export interface ListTempOptions {
  /**
   * Only files last modified before this instant
   */
  olderThan?: Date;
}

/**
 * File information
 */
export interface FileInfo {
  name: string;
  path: string;
  size: number;
  modifiedAt: Date;
}
