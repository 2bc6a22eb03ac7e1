// SPDX-License-Identifier: Apache-2.0

import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): AnyYargs {
    for (const flag of commandFlags) {
      const {defaultValue, ...definition} = flag.definition;
      // a default key, even undefined, makes yargs fill array options with [undefined]
      if (defaultValue === undefined || defaultValue === '') {
        y.option(flag.name, definition);
      } else {
        y.option(flag.name, {...definition, default: defaultValue});
      }
    }
    return y;
  }

  public static readBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    const value = argv[flag.name] ?? flag.definition.defaultValue;
    if (value === undefined) {
      return false;
    }
    if (typeof value !== 'boolean') {
      throw new IllegalArgumentError(`--${flag.name} must be a boolean`, value);
    }
    return value;
  }

  public static readString(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value = argv[flag.name];
    if (value === undefined || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`--${flag.name} must be a string`, value);
    }
    return value;
  }

  /**
   * Reads a flag that may be repeated
   */
  public static readStringArray(argv: ArgvStruct, flag: CommandFlag): string[] {
    const value = argv[flag.name];
    if (value === undefined) {
      return [];
    }
    const values: unknown[] = Array.isArray(value) ? value : [value];
    return values.map(item => {
      if (typeof item !== 'string' || item === '') {
        throw new IllegalArgumentError(`--${flag.name} must be a list of paths`, item);
      }
      return item;
    });
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly force: CommandFlag = {
    constName: 'force',
    name: 'force',
    definition: {
      describe: 'Download the dependencies again even if they are already present',
      defaultValue: false,
      alias: 'f',
      type: 'boolean',
    },
  };

  public static readonly packages: CommandFlag = {
    constName: 'packages',
    name: 'package',
    definition: {
      describe:
        'A chart directory to use instead of downloading the dependencies it fulfills, ' +
        'can be given several times (e.g. -p ../common -p ../backend)',
      alias: 'p',
      type: 'array',
      string: true,
    },
  };

  public static readonly remove: CommandFlag = {
    constName: 'remove',
    name: 'remove',
    definition: {
      describe: 'Remove the archives no dependency needs anymore, use --no-remove to keep them',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly touch: CommandFlag = {
    constName: 'touch',
    name: 'touch',
    definition: {
      describe: 'A file to touch when the dependencies were updated, handy for make like tools',
      type: 'string',
    },
  };

  public static readonly experimentalOci: CommandFlag = {
    constName: 'experimentalOci',
    name: 'experimental-oci',
    definition: {
      describe: 'Enable the experimental OCI support of helm when downloading dependencies',
      defaultValue: constants.EXPERIMENTAL_OCI,
      type: 'boolean',
    },
  };
}
