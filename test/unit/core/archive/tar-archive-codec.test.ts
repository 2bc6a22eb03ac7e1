// SPDX-License-Identifier: Apache-2.0

import 'chai-as-promised';

import {expect} from 'chai';
import {after, before, describe, it} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import * as tar from 'tar';
import {TarArchiveCodec} from '../../../../src/core/archive/tar-archive-codec.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';
import {ExtractFailureError} from '../../../../src/core/errors/extract-failure-error.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {RecordingLogger} from '../../fixtures/recording-logger.fixture.js';

describe('TarArchiveCodec', () => {
  const codec = new TarArchiveCodec(new RecordingLogger());
  let temporaryDirectory: string;
  let archivePath: string;

  before(async () => {
    temporaryDirectory = fs.mkdtempSync(PathEx.join(os.tmpdir(), 'tar-codec-'));
    const chartDirectory = PathEx.join(temporaryDirectory, 'layout', 'web');
    fs.mkdirSync(PathEx.join(chartDirectory, 'templates'), {recursive: true});
    fs.writeFileSync(PathEx.join(chartDirectory, 'Chart.yaml'), 'name: web\nversion: 2.0.0\n');
    fs.writeFileSync(PathEx.join(chartDirectory, 'templates', 'service.yaml'), 'kind: Service\n');

    archivePath = PathEx.join(temporaryDirectory, 'web-2.0.0.tgz');
    await tar.c({gzip: true, file: archivePath, cwd: PathEx.join(temporaryDirectory, 'layout')}, ['web']);
  });

  after(() => {
    fs.rmSync(temporaryDirectory, {recursive: true, force: true});
  });

  it('should fail if the archive is missing', async () => {
    await expect(codec.extract('', temporaryDirectory)).to.be.rejectedWith(MissingArgumentError);
  });

  it('should fail if the destination is missing', async () => {
    await expect(codec.extract(archivePath, '')).to.be.rejectedWith(MissingArgumentError);
  });

  it('should fail if the archive does not exist', async () => {
    await expect(
      codec.extract(PathEx.join(temporaryDirectory, 'nothing.tgz'), PathEx.join(temporaryDirectory, 'out-none')),
    ).to.be.rejectedWith(IllegalArgumentError, 'archivePath does not exist');
  });

  it('should fail if the destination exists', async () => {
    await expect(codec.extract(archivePath, temporaryDirectory)).to.be.rejectedWith(
      IllegalArgumentError,
      'destinationDirectory already exists',
    );
  });

  it('should fail for a file that is not an archive', async () => {
    const notAnArchive = PathEx.join(temporaryDirectory, 'notes.txt');
    fs.writeFileSync(notAnArchive, 'plain text');

    await expect(codec.extract(notAnArchive, PathEx.join(temporaryDirectory, 'out-text'))).to.be.rejectedWith(
      ExtractFailureError,
    );
  });

  it('should extract the chart and return its root', async () => {
    const destination = PathEx.join(temporaryDirectory, 'scratch', 'web-2.0.0.tgz');

    const root = await codec.extract(archivePath, destination);

    expect(root).to.equal(PathEx.join(destination, 'web'));
    expect(fs.readFileSync(PathEx.join(root, 'templates', 'service.yaml'), 'utf8')).to.equal('kind: Service\n');
    expect(fs.readdirSync(PathEx.join(temporaryDirectory, 'scratch'))).to.deep.equal(['web-2.0.0.tgz']);
  });
});
