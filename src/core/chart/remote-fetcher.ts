// SPDX-License-Identifier: Apache-2.0

import {type ChartManifest} from './chart-manifest.js';

export interface FetchOptions {
  readonly experimentalOci: boolean;
}

/**
 * Downloads dependencies that no provided source can fulfill.
 */
export interface RemoteFetcher {
  /**
   * Downloads every dependency listed in the manifest in one batch.
   *
   * @param manifest - the metadata of the requesting chart, listing only the dependencies to download
   * @param scratchDirectory - an empty directory owned by the caller
   * @param options - fetch settings
   * @returns names of the archives written in the `charts` directory of the scratch directory
   */
  fetch(manifest: ChartManifest, scratchDirectory: string, options: FetchOptions): Promise<Set<string>>;
}
