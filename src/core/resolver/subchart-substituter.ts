// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type ChartLoader} from '../chart/chart-loader.js';
import {type Chart} from '../chart/chart.js';
import {type SourceSet} from '../chart/source-set.js';
import {isDirectoryForm} from '../chart/subchart-entry.js';

/**
 * Replaces extracted subcharts by the provided sources, at any depth.
 */
@injectable()
export class SubchartSubstituter {
  private readonly chartLoader: ChartLoader;
  private readonly fileSystem: ChartFileSystem;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.ChartLoader) chartLoader?: ChartLoader,
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.chartLoader = patchInject(chartLoader, InjectTokens.ChartLoader, this.constructor.name);
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  /**
   * Walks the directory form subcharts of a chart. A subchart some source fulfills is replaced by a copy of the
   * source and not walked further, the others are walked recursively. Archives are left alone.
   *
   * @param chart - an extracted chart
   * @param sources - the provided sources
   * @returns true when at least one subchart was replaced
   * @throws AmbiguousSourceError when several sources fulfill the same subchart
   */
  public substitute(chart: Chart, sources: SourceSet): boolean {
    let updated = false;
    for (const entry of chart.subchartEntries().filter(isDirectoryForm)) {
      const subchart = this.chartLoader.load(entry.path);
      const match = sources.requireAtMostOne(subchart.fullyQualifiedName);
      if (match.kind === 'one') {
        const source = match.source;
        this.logger.info(`Substituting ${subchart.location} by the source ${source.name} from ${source.location}`);
        this.fileSystem.remove(subchart.location);
        this.fileSystem.copy(source.location, subchart.location);
        updated = true;
      } else {
        updated = this.substitute(subchart, sources) || updated;
      }
    }
    return updated;
  }
}
