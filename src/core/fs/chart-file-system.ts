// SPDX-License-Identifier: Apache-2.0

/**
 * The file system operations the chart model and the resolver rely on. Every path is absolute. Implementations
 * should not interpret the content they read or write.
 *
 * The resolver never touches the disk directly, so a virtual tree can stand in for the real file system.
 */
export interface ChartFileSystem {
  isDirectory(path: string): boolean;

  isFile(path: string): boolean;

  /**
   * Lists the entry names of a directory, sorted.
   *
   * @param directory - directory to list
   */
  list(directory: string): string[];

  readText(path: string): string;

  writeText(path: string, content: string): void;

  /** Creates the directory and any missing parent */
  makeDirectory(directory: string): void;

  /** Removes a file or a directory tree, does nothing if the path does not exist */
  remove(path: string): void;

  /** Copies a file or a directory tree, the destination must not exist */
  copy(source: string, destination: string): void;

  /** Moves a file or a directory tree, replacing the destination when it is a file */
  move(source: string, destination: string): void;

  /**
   * Creates a new empty scratch directory. The caller owns it and must remove it.
   *
   * @param prefix - prefix of the directory name
   * @returns absolute path of the created directory
   */
  makeTemporaryDirectory(prefix: string): string;

  /** Updates the modification time of a path, creating an empty file when it does not exist */
  touch(path: string): void;
}
