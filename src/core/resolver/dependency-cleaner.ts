// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type Chart} from '../chart/chart.js';
import {isArchiveForm} from '../chart/subchart-entry.js';

@injectable()
export class DependencyCleaner {
  private readonly fileSystem: ChartFileSystem;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  /**
   * Remove any archive in the subcharts directory that is not fulfilling a dependency.
   *
   * @returns paths of the removed archives
   */
  public clean(chart: Chart): string[] {
    const removed: string[] = [];
    for (const archive of chart.subchartEntries().filter(isArchiveForm)) {
      if (chart.matchToDependencies(archive.fullyQualifiedName).length === 0) {
        this.logger.info(`Removing ${archive.path}, no dependency of ${chart.fullyQualifiedName} needs it`);
        this.fileSystem.remove(archive.path);
        removed.push(archive.path);
      }
    }
    return removed;
  }
}
