// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  SubchartLogger: Symbol.for('SubchartLogger'),
  ResolverConfig: Symbol.for('ResolverConfig'),
  ChartFileSystem: Symbol.for('ChartFileSystem'),
  ArchiveCodec: Symbol.for('ArchiveCodec'),
  Helm: Symbol.for('Helm'),
  ChartPackager: Symbol.for('ChartPackager'),
  RemoteFetcher: Symbol.for('RemoteFetcher'),
  ChartLoader: Symbol.for('ChartLoader'),
  SubchartSubstituter: Symbol.for('SubchartSubstituter'),
  DependencyResolver: Symbol.for('DependencyResolver'),
  DependencyCleaner: Symbol.for('DependencyCleaner'),
  DependencyUpdater: Symbol.for('DependencyUpdater'),
  DependencyCommand: Symbol.for('DependencyCommand'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
};
