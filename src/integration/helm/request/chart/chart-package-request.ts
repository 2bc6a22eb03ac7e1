// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';

/**
 * A request to package a chart directory into a versioned archive.
 */
export class ChartPackageRequest implements HelmRequest {
  public constructor(
    public readonly chartDirectory: string,
    public readonly destination: string,
  ) {
    if (!chartDirectory || chartDirectory.trim() === '') {
      throw new Error('chartDirectory must not be blank');
    }
    if (!destination || destination.trim() === '') {
      throw new Error('destination must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('package').argument('destination', this.destination).positional(this.chartDirectory);
  }
}
