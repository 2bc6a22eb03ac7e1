// SPDX-License-Identifier: Apache-2.0

import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type SubchartLogger} from './core/logging/subchart-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {SubchartError} from './core/errors/subchart-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getSubchartVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: SubchartLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error('Error initializing container', error);
    throw new SubchartError('Error initializing container', error);
  }

  const logger = container.resolve<SubchartLogger>(InjectTokens.SubchartLogger);

  if (context) {
    // save the logger so that subchart.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new SubchartError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new SubchartError(`Uncaught Exception, origin: ${origin}`, error));
  });

  logger.debug('Initializing subchart CLI');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* Subchart *******************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getSubchartVersion()));
    logger.showUser(chalk.cyan('************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('')
    .usage('Usage:\n  subchart <command> [options]')
    .alias('h', 'help')
    .alias('v', 'version')
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [
        argv => {
          middlewares.setLoggerDevFlag()(argv);
        },
        argv => {
          middlewares.displayHeader()(argv);
        },
      ],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  for (const command of commands.Initialize()) {
    rootCmd.command(command);
  }

  rootCmd.fail((message, error) => {
    if (message) {
      if (message.includes('Unknown argument')) {
        logger.showUser(message);
        rootCmd.showHelp();
      } else {
        logger.showUserError(new SubchartError(`Error running subchart CLI, failure occurred: ${message}`));
      }
      rootCmd.exit(0, error);
    } else {
      throw error;
    }
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setOptionalCommandFlags(rootCmd, flags.devMode);
  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
