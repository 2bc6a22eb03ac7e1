// SPDX-License-Identifier: Apache-2.0

import {HelmExecution} from './helm-execution.js';
import {type SubchartLogger} from '../../../core/logging/subchart-logger.js';

/**
 * A builder for creating a helm command execution.
 */
export class HelmExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  /**
   * The list of subcommands to be used when execute the helm command.
   */
  private readonly _subcommands: string[] = [];

  /**
   * The arguments to be passed to the helm command.
   */
  private readonly _arguments: Map<string, string> = new Map();

  /**
   * The positional arguments to be passed to the helm command.
   */
  private readonly _positionals: string[] = [];

  /**
   * The environment variables to be set when executing the helm command.
   */
  private readonly _environmentVariables: Map<string, string> = new Map();

  /**
   * Creates a new HelmExecutionBuilder instance.
   * @param helmExecutable the helm executable, a path or a name looked up in PATH
   * @param logger receives the built command line
   */
  public constructor(
    private readonly helmExecutable: string,
    private readonly logger: SubchartLogger,
  ) {
    if (!helmExecutable || helmExecutable.trim() === '') {
      throw new Error('helmExecutable must not be blank');
    }
  }

  /**
   * Adds the list of subcommands to the helm execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  public subcommands(...commands: string[]): HelmExecutionBuilder {
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds an argument to the helm execution.
   * @param name the name of the argument
   * @param value the value of the argument
   * @returns this builder
   */
  public argument(name: string, value: string): HelmExecutionBuilder {
    if (!name) {
      throw new Error(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._arguments.set(name, value);
    return this;
  }

  /**
   * Adds a positional argument to the helm execution.
   * @param value the value of the positional argument
   * @returns this builder
   */
  public positional(value: string): HelmExecutionBuilder {
    if (!value) {
      throw new Error(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  /**
   * Adds an environment variable to the helm execution.
   * @param name the name of the environment variable
   * @param value the value of the environment variable
   * @returns this builder
   */
  public environmentVariable(name: string, value: string): HelmExecutionBuilder {
    if (!name) {
      throw new Error(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._environmentVariables.set(name, value);
    return this;
  }

  /**
   * Environment variables set on top of the process environment.
   */
  public environment(): Record<string, string> {
    return Object.fromEntries(this._environmentVariables);
  }

  /**
   * Builds the command array for the helm execution.
   * @returns the command array, the executable first
   */
  public buildCommand(): string[] {
    const command: string[] = [this.helmExecutable, ...this._subcommands];

    for (const [key, value] of this._arguments.entries()) {
      command.push(`--${key}`, value);
    }

    command.push(...this._positionals);

    return command;
  }

  /**
   * Builds the HelmExecution instance, which starts the process.
   * @returns the HelmExecution instance
   */
  public build(): HelmExecution {
    const command = this.buildCommand();
    this.logger.debug(`Helm command: helm ${command.slice(1).join(' ')}`);
    return new HelmExecution(command, process.cwd(), this.environment());
  }
}
