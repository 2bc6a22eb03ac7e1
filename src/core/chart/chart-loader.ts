// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type ResolverConfig} from '../config/resolver-config.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type ArchiveCodec} from '../archive/archive-codec.js';
import {type ChartPackager} from './chart-packager.js';
import {Chart, type ChartEnvironment} from './chart.js';
import {SourceSet} from './source-set.js';

/**
 * Builds charts bound to the injected file system, codec and packager.
 */
@injectable()
export class ChartLoader implements ChartEnvironment {
  public readonly fileSystem: ChartFileSystem;
  public readonly archiveCodec: ArchiveCodec;
  public readonly packager: ChartPackager;
  public readonly config: ResolverConfig;

  public constructor(
    @inject(InjectTokens.ChartFileSystem) fileSystem?: ChartFileSystem,
    @inject(InjectTokens.ArchiveCodec) archiveCodec?: ArchiveCodec,
    @inject(InjectTokens.ChartPackager) packager?: ChartPackager,
    @inject(InjectTokens.ResolverConfig) config?: ResolverConfig,
  ) {
    this.fileSystem = patchInject(fileSystem, InjectTokens.ChartFileSystem, this.constructor.name);
    this.archiveCodec = patchInject(archiveCodec, InjectTokens.ArchiveCodec, this.constructor.name);
    this.packager = patchInject(packager, InjectTokens.ChartPackager, this.constructor.name);
    this.config = patchInject(config, InjectTokens.ResolverConfig, this.constructor.name);
  }

  public load(location: string): Chart {
    return Chart.load(location, this);
  }

  public loadSources(locations: Iterable<string>): SourceSet {
    return new SourceSet([...locations].map(location => this.load(location)));
  }
}
