// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class FetchFailureError extends SubchartError {
  /**
   * @param chart - fully qualified name of the chart whose dependencies were being downloaded
   * @param dependencies - fully qualified names of the requested dependencies
   * @param cause - error raised by the fetcher
   */
  public constructor(chart: string, dependencies: readonly string[], cause?: unknown) {
    super(`Failed to download ${dependencies.join(', ')} for ${chart}`, cause, {chart, dependencies});
  }
}
