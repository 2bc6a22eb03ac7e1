// SPDX-License-Identifier: Apache-2.0

/**
 * Reads packaged charts.
 */
export interface ArchiveCodec {
  /**
   * Extracts a chart archive. The destination directory is created by the codec and only appears once the archive
   * has been fully extracted.
   *
   * @param archivePath - path to the chart archive
   * @param destinationDirectory - directory to create, must not exist
   * @returns path of the chart root directory inside the destination directory
   */
  extract(archivePath: string, destinationDirectory: string): Promise<string>;
}
