// SPDX-License-Identifier: Apache-2.0

import {SubchartError} from './subchart-error.js';

export class UserBreak extends SubchartError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
