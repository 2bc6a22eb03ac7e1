// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {SubchartWinstonLogger} from '../logging/subchart-winston-logger.js';
import {createResolverConfig, type ResolverConfig} from '../config/resolver-config.js';
import {NodeChartFileSystem} from '../fs/node-chart-file-system.js';
import {TarArchiveCodec} from '../archive/tar-archive-codec.js';
import {DefaultHelmClient} from '../../integration/helm/impl/default-helm-client.js';
import {HelmChartPackager} from '../chart/helm-chart-packager.js';
import {HelmRemoteFetcher} from '../chart/helm-remote-fetcher.js';
import {ChartLoader} from '../chart/chart-loader.js';
import {SubchartSubstituter} from '../resolver/subchart-substituter.js';
import {DependencyResolver} from '../resolver/dependency-resolver.js';
import {DependencyCleaner} from '../resolver/dependency-cleaner.js';
import {DependencyUpdater} from '../resolver/dependency-updater.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {DependencyCommand} from '../../commands/dependency.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logsDirectory - where the log file is written, defaults to constants.SUBCHART_LOGS_DIR
   * @param logLevel - the log level to use, defaults to constants.SUBCHART_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   * @param resolverConfig - the resolver configuration, defaults to the one read from the environment
   */
  public init(
    logsDirectory: string = constants.SUBCHART_LOGS_DIR,
    logLevel: string = constants.SUBCHART_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: SubchartLogger,
    resolverConfig: ResolverConfig = createResolverConfig(),
  ): void {
    if (Container.isInitialized) {
      container.resolve<SubchartLogger>(InjectTokens.SubchartLogger).debug('Container already initialized');
      return;
    }

    // SubchartLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogsDirectory, {useValue: logsDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.SubchartLogger, testLogger);
      container.resolve<SubchartLogger>(InjectTokens.SubchartLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.SubchartLogger,
        {useClass: SubchartWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<SubchartLogger>(InjectTokens.SubchartLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ResolverConfig, {useValue: resolverConfig});

    // Side effects
    container.register(
      InjectTokens.ChartFileSystem,
      {useClass: NodeChartFileSystem},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.ArchiveCodec, {useClass: TarArchiveCodec}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Helm, {useClass: DefaultHelmClient}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ChartPackager, {useClass: HelmChartPackager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.RemoteFetcher, {useClass: HelmRemoteFetcher}, {lifecycle: Lifecycle.Singleton});

    // Resolution
    container.register(InjectTokens.ChartLoader, {useClass: ChartLoader}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.SubchartSubstituter,
      {useClass: SubchartSubstituter},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.DependencyResolver,
      {useClass: DependencyResolver},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.DependencyCleaner, {useClass: DependencyCleaner}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.DependencyUpdater, {useClass: DependencyUpdater}, {lifecycle: Lifecycle.Singleton});

    container.resolve<SubchartLogger>(InjectTokens.SubchartLogger).debug('Container initialized');
    Container.isInitialized = true;

    // Commands
    container.register(InjectTokens.DependencyCommand, {useClass: DependencyCommand}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});
  }

  /**
   * clears the container registries and re-initializes the container
   */
  public reset(
    logsDirectory?: string,
    logLevel?: string,
    developmentMode?: boolean,
    testLogger?: SubchartLogger,
    resolverConfig?: ResolverConfig,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<SubchartLogger>(InjectTokens.SubchartLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logsDirectory, logLevel, developmentMode, testLogger, resolverConfig);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
