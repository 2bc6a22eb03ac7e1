// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import * as constants from '../../../../core/constants.js';

/**
 * A request to download the dependencies listed in a chart manifest into its charts directory.
 */
export class ChartDependencyUpdateRequest implements HelmRequest {
  public constructor(
    public readonly chartDirectory: string,
    public readonly experimentalOci: boolean = false,
  ) {
    if (!chartDirectory) {
      throw new Error('chartDirectory must not be null');
    }
    if (chartDirectory.trim() === '') {
      throw new Error('chartDirectory must not be blank');
    }
  }

  public apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('dependency', 'update').positional(this.chartDirectory);
    if (this.experimentalOci) {
      builder.environmentVariable(constants.HELM_EXPERIMENTAL_OCI_ENV, '1');
    }
  }
}
