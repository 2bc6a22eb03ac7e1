// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type ChartLoader} from '../chart/chart-loader.js';
import {type Chart} from '../chart/chart.js';
import {type SourceSet} from '../chart/source-set.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type DependencyResolver} from './dependency-resolver.js';
import {type DependencyCleaner} from './dependency-cleaner.js';

export interface DependencyUpdateRequest {
  /** directory of the chart whose dependencies to update */
  readonly chartPath: string;
  /** directories of the charts that stand in for dependencies */
  readonly sourcePaths: readonly string[];
  readonly force: boolean;
  /** remove archives no dependency needs anymore */
  readonly remove: boolean;
  /** a file to touch when anything was updated */
  readonly touch?: string;
  /** overrides the configured experimental OCI setting of the downloads */
  readonly experimentalOci?: boolean;
}

/**
 * What an update works on and what it produced so far
 */
export interface UpdateState {
  readonly request: DependencyUpdateRequest;
  readonly chart: Chart;
  readonly sources: SourceSet;
  updated: boolean;
  removed: string[];
}

export interface UpdateStep {
  readonly title: string;
  skip(state: UpdateState): boolean;
  run(state: UpdateState): Promise<void>;
}

@injectable()
export class DependencyUpdater {
  private readonly chartLoader: ChartLoader;
  private readonly resolver: DependencyResolver;
  private readonly cleaner: DependencyCleaner;
  private readonly fileSystem: ChartFileSystem;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.ChartLoader) chartLoader?: ChartLoader,
    @inject(InjectTokens.DependencyResolver) resolver?: DependencyResolver,
    @inject(InjectTokens.DependencyCleaner) cleaner?: DependencyCleaner,
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.chartLoader = patchInject(chartLoader, InjectTokens.ChartLoader, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.DependencyResolver, this.constructor.name);
    this.cleaner = patchInject(cleaner, InjectTokens.DependencyCleaner, this.constructor.name);
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  /**
   * Loads the chart and the sources, then runs every step.
   *
   * @returns true when anything was updated
   */
  public async update(request: DependencyUpdateRequest): Promise<boolean> {
    const state = this.start(request);
    for (const step of this.steps()) {
      if (!step.skip(state)) {
        await step.run(state);
      }
    }
    return state.updated;
  }

  /**
   * @throws MissingManifestError when the chart or any of the sources has no manifest
   */
  public start(request: DependencyUpdateRequest): UpdateState {
    const chart = this.chartLoader.load(request.chartPath);
    const sources = this.chartLoader.loadSources(request.sourcePaths);
    this.logger.debug(`Loaded ${chart.toString()} with ${sources.size} source(s)`, {
      sources: sources.toArray().map(source => source.location),
    });
    return {request, chart, sources, updated: false, removed: []};
  }

  /**
   * The steps of an update, in order: resolve, remove the unneeded archives, touch the marker file.
   */
  public steps(): UpdateStep[] {
    return [
      {
        title: 'Resolve dependencies',
        skip: () => false,
        run: async state => {
          state.updated = await this.resolve(state.chart, state.sources, state.request);
        },
      },
      {
        title: 'Remove unneeded archives',
        skip: state => !state.request.remove,
        run: async state => {
          state.removed = this.cleaner.clean(state.chart);
        },
      },
      {
        title: 'Touch marker file',
        skip: state => !state.updated || !state.request.touch,
        run: async state => {
          if (state.request.touch) {
            this.touch(state.request.touch);
          }
        },
      },
    ];
  }

  private async resolve(
    chart: Chart,
    sources: SourceSet,
    request: Pick<DependencyUpdateRequest, 'force' | 'experimentalOci'>,
  ): Promise<boolean> {
    const updated = await this.resolver.resolve(chart, sources, request.force, request.experimentalOci);
    this.logger.info(updated ? `Updated the dependencies of ${chart.fullyQualifiedName}` : 'Nothing to update');
    return updated;
  }

  private touch(path: string): void {
    const target = PathEx.resolve(path);
    this.logger.info(`Touching ${target}`);
    this.fileSystem.touch(target);
  }
}
