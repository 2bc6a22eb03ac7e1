// SPDX-License-Identifier: Apache-2.0

import {type Argv, type ArgumentsCamelCase} from 'yargs';

export type AnyYargs = Argv;

export type ArgvStruct = ArgumentsCamelCase;
