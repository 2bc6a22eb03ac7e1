// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class PackageFailureError extends SubchartError {
  public constructor(location: string, destination: string, cause?: unknown) {
    super(`Failed to package ${location} in ${destination}`, cause, {location, destination});
  }
}
