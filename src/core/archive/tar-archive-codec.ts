// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import * as tar from 'tar';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type SubchartLogger} from '../logging/subchart-logger.js';
import {MissingArgumentError} from '../errors/missing-argument-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {ExtractFailureError} from '../errors/extract-failure-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ArchiveCodec} from './archive-codec.js';

/**
 * Extracts gzipped tar chart archives, the format produced by `helm package`.
 */
@injectable()
export class TarArchiveCodec implements ArchiveCodec {
  private readonly logger: SubchartLogger;

  public constructor(@inject(InjectTokens.SubchartLogger) logger?: SubchartLogger) {
    this.logger = patchInject(logger, InjectTokens.SubchartLogger, this.constructor.name);
  }

  public async extract(archivePath: string, destinationDirectory: string): Promise<string> {
    if (!archivePath) throw new MissingArgumentError('archivePath is required');
    if (!destinationDirectory) throw new MissingArgumentError('destinationDirectory is required');

    if (!fs.existsSync(archivePath)) throw new IllegalArgumentError('archivePath does not exist', archivePath);
    if (fs.existsSync(destinationDirectory)) {
      throw new IllegalArgumentError('destinationDirectory already exists', destinationDirectory);
    }

    const parentDirectory = PathEx.dirname(destinationDirectory);
    fs.mkdirSync(parentDirectory, {recursive: true});
    const staging = fs.mkdtempSync(PathEx.join(parentDirectory, '.extract-'));
    try {
      this.logger.debug(`Extracting ${archivePath} -> ${destinationDirectory}`);
      await tar.x({file: archivePath, cwd: staging});
      fs.renameSync(staging, destinationDirectory);
    } catch (error) {
      throw new ExtractFailureError(archivePath, error instanceof Error ? error.message : String(error), error);
    } finally {
      fs.rmSync(staging, {recursive: true, force: true});
    }

    const roots = fs
      .readdirSync(destinationDirectory, {withFileTypes: true})
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
    if (roots.length !== 1) {
      throw new ExtractFailureError(archivePath, `expected a single chart directory, found ${roots.length}`);
    }

    return PathEx.join(destinationDirectory, roots[0]);
  }
}
