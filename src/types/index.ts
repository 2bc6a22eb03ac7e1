// SPDX-License-Identifier: Apache-2.0

import {type ListrTask} from 'listr2';
import {type CommandModule} from 'yargs';

// NOTE: DO NOT add any subchart imports in this file to avoid circular dependencies

export type SubchartListrTask<T> = ListrTask<T>;

export type CommandDefinition = CommandModule;
