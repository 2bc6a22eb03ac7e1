// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import chalk from 'chalk';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type SubchartLogger} from './logging/subchart-logger.js';
import {type ArgvStruct} from '../types/aliases.js';
import {getSubchartVersion} from '../../version.js';

@injectable()
export class Middlewares {
  private readonly logger: SubchartLogger;

  public constructor(@inject(InjectTokens.SubchartLogger) logger?: SubchartLogger) {
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  public setLoggerDevFlag() {
    const logger = this.logger;

    return (argv: ArgvStruct): ArgvStruct => {
      if (argv.dev) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }

      return argv;
    };
  }

  public displayHeader() {
    const logger = this.logger;

    return (argv: ArgvStruct): ArgvStruct => {
      const commandData = argv._.join(' ');
      logger.showUser(chalk.cyan('\n******************************* Subchart *******************************'));
      logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getSubchartVersion()));
      logger.showUser(chalk.cyan('Current Command\t\t:'), chalk.yellow(commandData));
      logger.showUser(chalk.cyan('************************************************************************'));

      return argv;
    };
  }
}
