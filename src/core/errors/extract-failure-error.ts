// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class ExtractFailureError extends SubchartError {
  public constructor(archivePath: string, reason: string, cause?: unknown) {
    super(`Failed to extract ${archivePath}: ${reason}`, cause, {archivePath});
  }
}
