// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type HelmClient} from '../helm-client.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {type HelmRequest} from '../request/helm-request.js';
import {ChartDependencyUpdateRequest} from '../request/chart/chart-dependency-update-request.js';
import {ChartPackageRequest} from '../request/chart/chart-package-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type SubchartLogger} from '../../../core/logging/subchart-logger.js';
import {type ResolverConfig} from '../../../core/config/resolver-config.js';

/**
 * The default implementation of the HelmClient interface.
 */
@injectable()
export class DefaultHelmClient implements HelmClient {
  private readonly logger: SubchartLogger;
  private readonly config: ResolverConfig;

  public constructor(
    @inject(InjectTokens.SubchartLogger) logger?: SubchartLogger,
    @inject(InjectTokens.ResolverConfig) config?: ResolverConfig,
  ) {
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
    this.config = patchInject(config, InjectTokens.ResolverConfig, this.constructor.name);
  }

  public async dependencyUpdate(chartDirectory: string, experimentalOci = false): Promise<void> {
    await this.execute(new ChartDependencyUpdateRequest(chartDirectory, experimentalOci));
  }

  public async packageChart(chartDirectory: string, destination: string): Promise<void> {
    await this.execute(new ChartPackageRequest(chartDirectory, destination));
  }

  /**
   * Creates the builder every request is applied to.
   */
  protected createBuilder(): HelmExecutionBuilder {
    return new HelmExecutionBuilder(this.config.helmExecutable, this.logger);
  }

  /**
   * Executes the given request and waits for helm to exit.
   *
   * @param request - The request to execute
   */
  private async execute<T extends HelmRequest>(request: T): Promise<void> {
    const builder = this.createBuilder();
    request.apply(builder);
    const execution = builder.build();
    await execution.call();
    this.logger.debug('helm output', {stdout: execution.standardOutput(), stderr: execution.standardError()});
  }
}
