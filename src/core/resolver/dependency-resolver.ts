// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ResolverConfig} from '../config/resolver-config.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type ChartLoader} from '../chart/chart-loader.js';
import {type Chart} from '../chart/chart.js';
import {type ChartDependency, fullyQualifiedName} from '../chart/chart-manifest.js';
import {type RemoteFetcher} from '../chart/remote-fetcher.js';
import {type SingleSourceMatch, type SourceSet} from '../chart/source-set.js';
import {SourceCycleError} from '../errors/source-cycle-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type SubchartSubstituter} from './subchart-substituter.js';

interface ResolutionSettings {
  readonly force: boolean;
  readonly experimentalOci: boolean;
}

/**
 * Makes sure the dependencies of a chart are present and up to date in its subcharts directory.
 *
 * For each dependency, in order of precedence:
 * 1. a provided source fulfilling it is resolved recursively and packaged in place
 * 2. with force, it is downloaded again
 * 3. an archive already present is kept
 * 4. otherwise it is downloaded
 *
 * Downloads are batched in one fetch per chart. Every kept or downloaded archive is then extracted and its nested
 * subcharts substituted by the provided sources, in which case it is packaged again.
 */
@injectable()
export class DependencyResolver {
  private readonly chartLoader: ChartLoader;
  private readonly remoteFetcher: RemoteFetcher;
  private readonly substituter: SubchartSubstituter;
  private readonly fileSystem: ChartFileSystem;
  private readonly config: ResolverConfig;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.ChartLoader) chartLoader?: ChartLoader,
    @inject(InjectTokens.RemoteFetcher) remoteFetcher?: RemoteFetcher,
    @inject(InjectTokens.SubchartSubstituter) substituter?: SubchartSubstituter,
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.ResolverConfig) config?: ResolverConfig,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.chartLoader = patchInject(chartLoader, InjectTokens.ChartLoader, this.constructor.name);
    this.remoteFetcher = patchInject(remoteFetcher, InjectTokens.RemoteFetcher, this.constructor.name);
    this.substituter = patchInject(substituter, InjectTokens.SubchartSubstituter, this.constructor.name);
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.config = patchInject(config, InjectTokens.ResolverConfig, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  /**
   * @param chart - the chart whose dependencies to update
   * @param sources - the provided sources
   * @param force - download again the dependencies no source fulfills, even when already present
   * @param experimentalOci - switches on the experimental OCI support of the downloads, defaults to the configuration
   * @returns true when anything was packaged, downloaded or substituted
   * @throws AmbiguousSourceError when several sources fulfill the same dependency
   * @throws SourceCycleError when provided sources depend on each other in a cycle
   */
  public async resolve(chart: Chart, sources: SourceSet, force = false, experimentalOci?: boolean): Promise<boolean> {
    const settings = {force, experimentalOci: experimentalOci ?? this.config.experimentalOci};
    return this.resolveChart(chart, sources, settings, []);
  }

  private async resolveChart(
    chart: Chart,
    sources: SourceSet,
    settings: ResolutionSettings,
    lineage: readonly Chart[],
  ): Promise<boolean> {
    const trail = [...lineage, chart];
    const toFetch: ChartDependency[] = [];
    const toRecheck = new Set<string>();
    let updated = false;

    if (chart.dependencies.length > 0) {
      this.fileSystem.makeDirectory(chart.subchartsDir);
    }

    for (const dependency of chart.dependencies) {
      const dependencyName = fullyQualifiedName(dependency);
      const archivePath = chart.archivePath(dependencyName);
      const match = sources.requireAtMostOne(dependencyName);

      if (match.kind === 'one') {
        await this.packageSource(chart, dependencyName, match, sources, settings, trail);
        updated = true;
      } else if (settings.force) {
        this.logger.info(
          `Downloading ${PathEx.basename(archivePath)} as a dependency of ${chart.fullyQualifiedName}` +
            ' unconditionally (force is set)',
        );
        toFetch.push(dependency);
      } else if (this.fileSystem.isFile(archivePath)) {
        this.logger.info(
          `${PathEx.basename(archivePath)} is already an up to date dependency of ${chart.fullyQualifiedName}`,
        );
        toRecheck.add(archivePath);
      } else {
        toFetch.push(dependency);
      }
    }

    if (toFetch.length > 0) {
      for (const archivePath of await this.fetchDependencies(chart, toFetch, settings.experimentalOci)) {
        toRecheck.add(archivePath);
      }
      updated = true;
    }

    if (toRecheck.size > 0) {
      updated = (await this.recheckArchives(chart, [...toRecheck], sources)) || updated;
    }

    return updated;
  }

  private async packageSource(
    chart: Chart,
    dependencyName: string,
    match: SingleSourceMatch,
    sources: SourceSet,
    settings: ResolutionSettings,
    trail: readonly Chart[],
  ): Promise<void> {
    const source = match.source;
    if (trail.some(visited => visited.location === source.location)) {
      throw new SourceCycleError([...trail, source].map(visited => visited.fullyQualifiedName));
    }

    if (match.guessed) {
      this.logger.showUserWarning(
        `Guessed that the provided package ${source.fullyQualifiedName} (available at ${source.location})` +
          ` is a good candidate to fulfill the dependency ${dependencyName}. Am I wrong?`,
      );
    }

    this.logger.info(`Using ${source.fullyQualifiedName} (from ${source.location}) to fulfill ${dependencyName}`);
    await this.resolveChart(source, sources, settings, trail);
    await source.package(chart.subchartsDir);
  }

  /**
   * Downloads the dependencies in one batch and moves the archives in the subcharts directory.
   *
   * @returns paths of the archives moved in the subcharts directory
   */
  private async fetchDependencies(
    chart: Chart,
    dependencies: readonly ChartDependency[],
    experimentalOci: boolean,
  ): Promise<string[]> {
    const requested = dependencies.map(dependency => fullyQualifiedName(dependency)).join(', ');
    this.logger.info(`Starting to download ${requested} for ${chart.fullyQualifiedName}`);

    const scratchDirectory = this.fileSystem.makeTemporaryDirectory(this.config.scratchDirectoryPrefix);
    try {
      const produced = await this.remoteFetcher.fetch(chart.partialManifest(dependencies), scratchDirectory, {
        experimentalOci,
      });

      const downloadDirectory = PathEx.join(scratchDirectory, this.config.subchartsDirectoryName);
      this.fileSystem.makeDirectory(chart.subchartsDir);
      const archives: string[] = [];
      for (const archiveName of [...produced].sort()) {
        const destination = PathEx.join(chart.subchartsDir, archiveName);
        this.fileSystem.move(PathEx.join(downloadDirectory, archiveName), destination);
        archives.push(destination);
      }

      this.logger.info(`Downloaded ${requested} for ${chart.fullyQualifiedName}`);
      return archives;
    } finally {
      this.fileSystem.remove(scratchDirectory);
    }
  }

  /**
   * Extracts each archive, substitutes its nested subcharts and packages it again when something changed.
   *
   * @returns true when at least one archive was packaged again
   */
  private async recheckArchives(chart: Chart, archivePaths: readonly string[], sources: SourceSet): Promise<boolean> {
    let updated = false;
    const scratchDirectory = this.fileSystem.makeTemporaryDirectory(this.config.scratchDirectoryPrefix);
    try {
      for (const archivePath of archivePaths) {
        const extracted = await chart.extract(
          archivePath,
          PathEx.join(scratchDirectory, PathEx.basename(archivePath)),
        );
        const dependencyChart = this.chartLoader.load(extracted);
        if (this.substituter.substitute(dependencyChart, sources)) {
          this.logger.info(
            `In ${chart.location}, substituting ${dependencyChart.fullyQualifiedName} by the resolved one`,
          );
          const written = await dependencyChart.package(chart.subchartsDir);
          // the new archive replaced the old one, unless the archive was not named after its manifest
          if (written !== archivePath) {
            this.fileSystem.remove(archivePath);
          }
          updated = true;
        }
      }
    } finally {
      this.fileSystem.remove(scratchDirectory);
    }
    return updated;
  }
}
