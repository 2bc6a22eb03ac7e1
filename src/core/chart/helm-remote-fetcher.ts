// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {type ResolverConfig} from '../config/resolver-config.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {FetchFailureError} from '../errors/fetch-failure-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ChartManifest, fullyQualifiedName, stringifyChartManifest} from './chart-manifest.js';
import {type FetchOptions, type RemoteFetcher} from './remote-fetcher.js';

/**
 * Downloads dependencies with `helm dependency update` run against a manifest written in the scratch directory.
 */
@injectable()
export class HelmRemoteFetcher implements RemoteFetcher {
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

  public async fetch(manifest: ChartManifest, scratchDirectory: string, options: FetchOptions): Promise<Set<string>> {
    const requested = (manifest.dependencies ?? []).map(dependency => fullyQualifiedName(dependency));

    this.fileSystem.writeText(
      PathEx.join(scratchDirectory, this.config.manifestFileName),
      stringifyChartManifest(manifest),
    );

    try {
      await this.helm.dependencyUpdate(scratchDirectory, options.experimentalOci);
    } catch (error) {
      throw new FetchFailureError(fullyQualifiedName(manifest), requested, error);
    }

    const chartsDirectory = PathEx.join(scratchDirectory, this.config.subchartsDirectoryName);
    if (!this.fileSystem.isDirectory(chartsDirectory)) {
      this.logger.warn(`helm wrote no ${this.config.subchartsDirectoryName} directory for ${manifest.name}`);
      return new Set();
    }

    return new Set(
      this.fileSystem.list(chartsDirectory).filter(name => name.endsWith(this.config.archiveExtension)),
    );
  }
}
