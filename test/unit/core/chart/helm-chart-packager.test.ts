// SPDX-License-Identifier: Apache-2.0

import 'chai-as-promised';

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {HelmChartPackager} from '../../../../src/core/chart/helm-chart-packager.js';
import {createResolverConfig} from '../../../../src/core/config/resolver-config.js';
import {PackageFailureError} from '../../../../src/core/errors/package-failure-error.js';
import {InMemoryChartFileSystem} from '../../fixtures/in-memory-chart-file-system.fixture.js';
import {RecordingLogger} from '../../fixtures/recording-logger.fixture.js';
import {type HelmCall, StubHelmClient} from '../../fixtures/stub-helm-client.fixture.js';

describe('HelmChartPackager', () => {
  const chart = {location: '/src/db', fullyQualifiedName: 'db-1.2.0'};

  function packager(fileSystem: InMemoryChartFileSystem, helm: StubHelmClient): HelmChartPackager {
    return new HelmChartPackager(helm, fileSystem, createResolverConfig(), new RecordingLogger());
  }

  it('should move the archive written by helm into the destination', async () => {
    const fileSystem = new InMemoryChartFileSystem();
    const helm = new StubHelmClient((call: HelmCall) => {
      if (call.command === 'packageChart') {
        fileSystem.writeText(`${call.destination}/db-1.2.0.tgz`, 'archive');
      }
    });

    const archivePath = await packager(fileSystem, helm).package(chart, '/app/charts');

    expect(archivePath).to.equal('/app/charts/db-1.2.0.tgz');
    expect(fileSystem.readText('/app/charts/db-1.2.0.tgz')).to.equal('archive');
    expect(helm.calls).to.deep.equal([{command: 'packageChart', chartDirectory: '/src/db', destination: '/tmp/subchart-1'}]);
    expect(fileSystem.exists('/tmp/subchart-1')).to.be.false;
  });

  it('should replace an archive of the same name', async () => {
    const fileSystem = new InMemoryChartFileSystem();
    fileSystem.writeFile('/app/charts/db-1.2.0.tgz', 'stale');
    const helm = new StubHelmClient((call: HelmCall) => {
      if (call.command === 'packageChart') {
        fileSystem.writeText(`${call.destination}/db-1.2.0.tgz`, 'fresh');
      }
    });

    await packager(fileSystem, helm).package(chart, '/app/charts');

    expect(fileSystem.readText('/app/charts/db-1.2.0.tgz')).to.equal('fresh');
  });

  it('should fail when helm fails and leave the destination alone', async () => {
    const fileSystem = new InMemoryChartFileSystem();
    const helm = new StubHelmClient(() => {
      throw new Error('helm exploded');
    });

    await expect(packager(fileSystem, helm).package(chart, '/app/charts')).to.be.rejectedWith(
      PackageFailureError,
      'Failed to package /src/db in /app/charts',
    );
    expect(fileSystem.exists('/app/charts')).to.be.false;
    expect(fileSystem.exists('/tmp/subchart-1')).to.be.false;
  });

  it('should fail when helm writes no archive', async () => {
    const fileSystem = new InMemoryChartFileSystem();

    await expect(packager(fileSystem, new StubHelmClient()).package(chart, '/app/charts')).to.be.rejectedWith(
      PackageFailureError,
    );
    expect(fileSystem.exists('/tmp/subchart-1')).to.be.false;
  });
});
