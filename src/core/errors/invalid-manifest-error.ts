// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class InvalidManifestError extends SubchartError {
  public constructor(manifestPath: string, reason: string, cause?: unknown) {
    super(`Invalid chart manifest ${manifestPath}: ${reason}`, cause, {manifestPath});
  }
}
