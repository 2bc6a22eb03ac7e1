// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type SubchartLogger} from './logging/subchart-logger.js';
import {UserBreak} from './errors/user-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: SubchartLogger;

  public constructor(@inject(InjectTokens.SubchartLogger) logger?: SubchartLogger) {
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const userBreak = this.extractBreak(error);
    if (userBreak) {
      this.handleUserBreak(userBreak);
    } else {
      this.handleError(error);
    }
  }

  private handleUserBreak(userBreak: UserBreak): void {
    this.logger.showUser(userBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
  }

  /**
   * Recursively checks if an error is or is caused by a UserBreak
   */
  private extractBreak(error: unknown): UserBreak | false {
    if (error instanceof UserBreak) {
      return error;
    }
    if (error instanceof Error && error.cause) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
