// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class AmbiguousSourceError extends SubchartError {
  /**
   * Raised when more than one provided source could fulfill the same dependency. The caller has to narrow the
   * source set, there is no tie-break.
   *
   * error metadata will include `dependency` and `candidates`
   *
   * @param dependency - fully qualified name of the dependency
   * @param candidates - locations of every matching source
   */
  public constructor(
    public readonly dependency: string,
    public readonly candidates: readonly string[],
  ) {
    super(
      `Several provided packages could fulfill the dependency ${dependency}: ${candidates.join(', ')}`,
      undefined,
      {dependency, candidates},
    );
  }
}
