// SPDX-License-Identifier: Apache-2.0

import {Listr} from 'listr2';
import {inject, injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import * as constants from '../core/constants.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../core/logging/subchart-logger.js';
import {SubchartError} from '../core/errors/subchart-error.js';
import {
  type DependencyUpdater,
  type DependencyUpdateRequest,
  type UpdateState,
} from '../core/resolver/dependency-updater.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition, type SubchartListrTask} from '../types/index.js';
import {Flags as flags} from './flags.js';

/**
 * Defines the functionalities of the 'dependency' command
 */
@injectable()
export class DependencyCommand {
  public static readonly COMMAND_NAME = 'dependency';
  public static readonly UPDATE_SUBCOMMAND_NAME = 'update';

  private readonly updater: DependencyUpdater;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.DependencyUpdater) updater?: DependencyUpdater,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.updater = patchInject(updater, InjectTokens.DependencyUpdater, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  /**
   * Builds the update request out of the parsed command line
   */
  public static toUpdateRequest(argv: ArgvStruct): DependencyUpdateRequest {
    const chart = argv.chart;
    return {
      chartPath: typeof chart === 'string' && chart !== '' ? chart : '.',
      sourcePaths: flags.readStringArray(argv, flags.packages),
      force: flags.readBoolean(argv, flags.force),
      remove: flags.readBoolean(argv, flags.remove),
      touch: flags.readString(argv, flags.touch),
      experimentalOci: flags.readBoolean(argv, flags.experimentalOci),
    };
  }

  public updateTasks(): SubchartListrTask<UpdateState>[] {
    return this.updater.steps().map(step => ({
      title: step.title,
      skip: (context_: UpdateState) => step.skip(context_),
      task: (context_: UpdateState) => step.run(context_),
    }));
  }

  /** Executes the dependency update CLI command */
  public async update(argv: ArgvStruct): Promise<boolean> {
    const request = DependencyCommand.toUpdateRequest(argv);
    this.logger.debug('Updating dependencies', {request});

    // a missing manifest is reported before any task starts
    const state = this.updater.start(request);

    const tasks = new Listr<UpdateState>(this.updateTasks(), {
      concurrent: false,
      rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
    });

    let context_: UpdateState;
    try {
      context_ = await tasks.run(state);
    } catch (error) {
      throw new SubchartError(`Error updating the dependencies of ${request.chartPath}`, error);
    }

    if (context_.removed.length > 0) {
      this.logger.showList('Removed archives', context_.removed);
    }
    this.logger.showUser(
      context_.updated
        ? chalk.green(`Updated the dependencies of ${context_.chart.fullyQualifiedName}`)
        : chalk.grey(`The dependencies of ${context_.chart.fullyQualifiedName} are up to date`),
    );
    return context_.updated;
  }

  /**
   * Return Yargs command definition for 'dependency' command
   * @returns A object representing the Yargs command definition
   */
  public getCommandDefinition(): CommandDefinition {
    return {
      command: DependencyCommand.COMMAND_NAME,
      describe: 'Manage the dependencies of a chart',
      builder: (yargs: AnyYargs) =>
        yargs
          .command({
            command: `${DependencyCommand.UPDATE_SUBCOMMAND_NAME} [chart]`,
            describe:
              'Update the charts/ directory of a chart, using the provided packages in place of the ' +
              'dependencies they fulfill, at any depth',
            builder: (y: AnyYargs) => {
              y.positional('chart', {describe: 'The chart directory', type: 'string', default: '.'});
              return flags.setOptionalCommandFlags(
                y,
                flags.packages,
                flags.force,
                flags.remove,
                flags.touch,
                flags.experimentalOci,
              );
            },
            handler: async (argv: ArgvStruct) => {
              this.logger.info(`==== Running '${DependencyCommand.COMMAND_NAME} update' ===`);
              await this.update(argv);
              this.logger.info(`==== Finished running '${DependencyCommand.COMMAND_NAME} update' ====`);
            },
          })
          .demandCommand(1, 'Select a dependency command'),
      handler: () => {},
    };
  }
}
