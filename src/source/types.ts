/**
 * Types for reading instrument exports from disk.
 */

/**
 * A file read from the source directory.
 */
export interface SourceFile {
  /** Path relative to the source directory */
  path: string;
  /** File content */
  content: string;
  /** File size in bytes */
  size: number;
}

/**
 * Options for listing files.
 */
export interface ListFilesOptions {
  /** Directory relative to the source root (default: '.') */
  directory?: string;
  /** Simple glob: '*.txt', 'prefix*' or an exact name */
  pattern?: string;
  /** Descend into subdirectories */
  recursive?: boolean;
}

/**
 * Configuration for LocalSpectrumSource.
 */
export interface LocalSourceConfig {
  /** Absolute path of the directory holding instrument exports */
  basePath: string;
}
