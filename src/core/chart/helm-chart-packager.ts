// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ResolverConfig} from '../config/resolver-config.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {PackageFailureError} from '../errors/package-failure-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ChartPackager, type PackageableChart} from './chart-packager.js';

/**
 * Packages charts with `helm package`. Helm writes into a scratch directory and the archive is then moved into place.
 */
@injectable()
export class HelmChartPackager implements ChartPackager {
  private readonly helm: HelmClient;
  private readonly fileSystem: ChartFileSystem;
  private readonly config: ResolverConfig;
  private readonly logger: SubchartLogger;

  public constructor(
    @inject(InjectTokens.Helm) helm?: HelmClient,
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.ResolverConfig) config?: ResolverConfig,
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
  ) {
    this.helm = patchInject(helm, InjectTokens.Helm, this.constructor.name);
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.config = patchInject(config, InjectTokens.ResolverConfig, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  public async package(chart: PackageableChart, destinationDirectory: string): Promise<string> {
    this.logger.info(`Packaging ${chart.fullyQualifiedName} (from ${chart.location}) in ${destinationDirectory}`);

    const scratchDirectory = this.fileSystem.makeTemporaryDirectory(this.config.scratchDirectoryPrefix);
    try {
      await this.helm.packageChart(chart.location, scratchDirectory);

      const produced = this.fileSystem
        .list(scratchDirectory)
        .filter(name => name.endsWith(this.config.archiveExtension));
      if (produced.length !== 1) {
        throw new PackageFailureError(
          chart.location,
          destinationDirectory,
          new Error(`expected helm to write one archive, found ${produced.length}`),
        );
      }

      this.fileSystem.makeDirectory(destinationDirectory);
      const archivePath = PathEx.join(destinationDirectory, produced[0]);
      this.fileSystem.move(PathEx.join(scratchDirectory, produced[0]), archivePath);
      return archivePath;
    } catch (error) {
      if (error instanceof PackageFailureError) {
        throw error;
      }
      throw new PackageFailureError(chart.location, destinationDirectory, error);
    } finally {
      this.fileSystem.remove(scratchDirectory);
    }
  }
}
