// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class MissingManifestError extends SubchartError {
  /**
   * Raised when a path given as a chart or a source has no manifest file in it
   *
   * error metadata will include `location` and `manifestFile`
   *
   * @param location - directory that was expected to hold a chart
   * @param manifestFile - name of the manifest file that was looked for
   */
  public constructor(location: string, manifestFile: string) {
    super(
      `No file ${manifestFile} in the directory ${location}. You must provide as argument the path to a` +
        ` helm chart directory (meaning with ${manifestFile} inside)`,
      undefined,
      {location, manifestFile},
    );
  }
}
