// SPDX-License-Identifier: Apache-2.0

export interface PackageableChart {
  readonly location: string;
  readonly fullyQualifiedName: string;
}

/**
 * Turns chart directories into archives.
 */
export interface ChartPackager {
  /**
   * Packages a chart directory into an archive placed in the destination directory, replacing any archive of the same
   * name. The archive only appears in the destination once it is complete.
   *
   * @param chart - the chart to package
   * @param destinationDirectory - directory receiving the archive, created when missing
   * @returns path of the written archive
   */
  package(chart: PackageableChart, destinationDirectory: string): Promise<string>;
}
