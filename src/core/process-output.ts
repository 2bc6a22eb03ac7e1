// SPDX-License-Identifier: Apache-2.0

import {ProcessOutput} from 'listr2';
import {type SubchartLogger} from './logging/subchart-logger.js';

/** Mirrors Listr2 process output into the subchart logger */
export class CustomProcessOutput extends ProcessOutput {
  public constructor(private readonly logger: SubchartLogger) {
    super();
  }

  public override toStdout(chunk: string, eol = true) {
    for (const line of chunk.toString().split('\n')) {
      this.logger.debug(line);
    }
    return super.toStdout(chunk, eol);
  }

  public override toStderr(chunk: string, eol = true) {
    this.logger.error(chunk.toString());
    return super.toStderr(chunk, eol);
  }
}
