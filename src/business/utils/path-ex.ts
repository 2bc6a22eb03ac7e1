// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

/**
 * Path helpers every chart path goes through, so that locations compare as plain strings.
 */
export class PathEx {
  /**
   * Joins path segments and normalizes the result.
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths into an absolute path, against the working directory when none is absolute.
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  public static basename(filePath: string, suffix?: string): string {
    return path.basename(filePath, suffix);
  }

  public static dirname(filePath: string): string {
    return path.dirname(filePath);
  }
}
