// SPDX-License-Identifier: Apache-2.0

import * as constants from '../constants.js';

/**
 * Settings shared by the chart model, the resolver and the helm backed collaborators. Everything that would otherwise
 * be read from the process environment while resolving is carried here.
 */
export interface ResolverConfig {
  /** Whether remote fetches set HELM_EXPERIMENTAL_OCI=1 when the update request does not say */
  readonly experimentalOci: boolean;
  readonly helmExecutable: string;
  readonly manifestFileName: string;
  readonly subchartsDirectoryName: string;
  readonly archiveExtension: string;
  readonly scratchDirectoryPrefix: string;
}

export function createResolverConfig(overrides: Partial<ResolverConfig> = {}): ResolverConfig {
  return {
    experimentalOci: constants.EXPERIMENTAL_OCI,
    helmExecutable: constants.HELM,
    manifestFileName: constants.CHART_MANIFEST_FILE,
    subchartsDirectoryName: constants.SUBCHARTS_DIR_NAME,
    archiveExtension: constants.CHART_ARCHIVE_EXTENSION,
    scratchDirectoryPrefix: constants.SCRATCH_DIR_PREFIX,
    ...overrides,
  };
}
