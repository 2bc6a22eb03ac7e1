// SPDX-License-Identifier: Apache-2.0

/**
 * The helm commands the resolver needs.
 */
export interface HelmClient {
  /**
   * Executes `helm dependency update` on a chart directory.
   * @param chartDirectory - the chart directory holding the manifest
   * @param experimentalOci - whether helm's experimental OCI support is switched on
   */
  dependencyUpdate(chartDirectory: string, experimentalOci?: boolean): Promise<void>;

  /**
   * Executes `helm package` on a chart directory.
   * @param chartDirectory - the chart directory to package
   * @param destination - directory receiving the archive
   */
  packageChart(chartDirectory: string, destination: string): Promise<void>;
}
