// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {SourceSet} from '../../../../src/core/chart/source-set.js';
import {AmbiguousSourceError} from '../../../../src/core/errors/ambiguous-source-error.js';
import {ResolverHarness} from '../../fixtures/resolver-harness.fixture.js';
import {chartArchive, writeChart} from '../../fixtures/chart-archive.fixture.js';

describe('SubchartSubstituter', () => {
  let harness: ResolverHarness;

  beforeEach(() => {
    harness = new ResolverHarness();
    writeChart(harness.fileSystem, '/x/web', {name: 'web', version: '2.0.0'});
    writeChart(harness.fileSystem, '/x/web/charts/api', {name: 'api', version: '1.0.0'});
    writeChart(harness.fileSystem, '/x/web/charts/api/charts/db', {
      name: 'db',
      version: '3.1.0',
      files: {'values.yaml': 'remote: true\n'},
    });
    writeChart(harness.fileSystem, '/src/db', {name: 'db', version: '3.1.0', files: {'values.yaml': 'local: true\n'}});
  });

  it('should report no change without subcharts directory', () => {
    writeChart(harness.fileSystem, '/x/bare', {name: 'bare', version: '1.0.0'});
    const sources = harness.chartLoader.loadSources(['/src/db']);

    expect(harness.substituter.substitute(harness.chartLoader.load('/x/bare'), sources)).to.be.false;
  });

  it('should report no change when no source matches', () => {
    const before = harness.fileSystem.snapshot('/x/web');

    expect(harness.substituter.substitute(harness.chartLoader.load('/x/web'), SourceSet.empty())).to.be.false;
    expect(harness.fileSystem.snapshot('/x/web')).to.deep.equal(before);
  });

  it('should replace a nested subchart by the source', () => {
    const sources = harness.chartLoader.loadSources(['/src/db']);

    expect(harness.substituter.substitute(harness.chartLoader.load('/x/web'), sources)).to.be.true;

    expect(harness.fileSystem.readText('/x/web/charts/api/charts/db/values.yaml')).to.equal('local: true\n');
  });

  it('should not walk into a replaced subchart', () => {
    writeChart(harness.fileSystem, '/src/api', {name: 'api', version: '1.0.0'});
    const sources = harness.chartLoader.loadSources(['/src/api', '/src/db']);

    expect(harness.substituter.substitute(harness.chartLoader.load('/x/web'), sources)).to.be.true;

    expect(harness.fileSystem.snapshot('/x/web/charts/api')).to.deep.equal(harness.fileSystem.snapshot('/src/api'));
    expect(harness.fileSystem.exists('/x/web/charts/api/charts/db')).to.be.false;
  });

  it('should leave archives alone', () => {
    harness.fileSystem.writeFile('/x/web/charts/db-3.1.0.tgz', chartArchive({name: 'db', version: '3.1.0'}));
    const before = harness.fileSystem.readText('/x/web/charts/db-3.1.0.tgz');

    harness.substituter.substitute(harness.chartLoader.load('/x/web'), harness.chartLoader.loadSources(['/src/db']));

    expect(harness.fileSystem.readText('/x/web/charts/db-3.1.0.tgz')).to.equal(before);
    expect(harness.archiveCodec.extracted).to.be.empty;
  });

  it('should refuse several sources for one subchart', () => {
    writeChart(harness.fileSystem, '/src/db-3', {name: 'db-3', version: '9.0.0'});
    const sources = harness.chartLoader.loadSources(['/src/db', '/src/db-3']);

    expect(() => harness.substituter.substitute(harness.chartLoader.load('/x/web'), sources)).to.throw(
      AmbiguousSourceError,
      'db-3.1.0',
    );
    expect(harness.fileSystem.readText('/x/web/charts/api/charts/db/values.yaml')).to.equal('remote: true\n');
  });
});
