// SPDX-License-Identifier: Apache-2.0

import {Container} from '../src/core/dependency-injection/container-init.js';
import {type SubchartLogger} from '../src/core/logging/subchart-logger.js';
import {type ResolverConfig} from '../src/core/config/resolver-config.js';
import {PathEx} from '../src/business/utils/path-ex.js';

const LOGS_DIRECTORY = PathEx.join('test', 'data', 'tmp', 'logs');

export function resetForTest(
  logsDirectory: string = LOGS_DIRECTORY,
  testLogger?: SubchartLogger,
  resolverConfig?: ResolverConfig,
): void {
  Container.getInstance().reset(logsDirectory, 'debug', true, testLogger, resolverConfig);
}
