// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class SourceCycleError extends SubchartError {
  public constructor(public readonly cycle: readonly string[]) {
    super(`Provided packages depend on each other in a cycle: ${cycle.join(' -> ')}`, undefined, {cycle});
  }
}
