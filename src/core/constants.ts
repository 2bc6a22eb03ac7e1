// SPDX-License-Identifier: Apache-2.0

import {type ListrLogger, PRESET_TIMER} from 'listr2';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- subchart related constants -----------------------------------------------------------------
export const SUBCHART_HOME_DIR = process.env.SUBCHART_HOME || PathEx.join(os.homedir(), '.subchart');
export const SUBCHART_LOGS_DIR = PathEx.join(SUBCHART_HOME_DIR, 'logs');
export const SUBCHART_LOG_FILE = 'subchart.log';
export const SUBCHART_LOG_LEVEL = process.env.SUBCHART_LOG_LEVEL || 'debug';

// -------------------- helm related constants ---------------------------------------------------------------------
export const HELM = process.env.SUBCHART_HELM_BINARY || 'helm';
export const HELM_EXPERIMENTAL_OCI_ENV = 'HELM_EXPERIMENTAL_OCI';
export const EXPERIMENTAL_OCI = process.env.SUBCHART_EXPERIMENTAL_OCI !== 'false';

// -------------------- chart layout constants ---------------------------------------------------------------------
export const CHART_MANIFEST_FILE = 'Chart.yaml';
export const SUBCHARTS_DIR_NAME = 'charts';
export const CHART_ARCHIVE_EXTENSION = '.tgz';
export const SCRATCH_DIR_PREFIX = 'subchart-';

export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
