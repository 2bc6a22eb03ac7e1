// SPDX-License-Identifier: Apache-2.0

import 'chai-as-promised';

import {expect} from 'chai';
import {after, afterEach, before, describe, it} from 'mocha';
import sinon, {type SinonStub} from 'sinon';
import {DefaultHelmClient} from '../../../../../src/integration/helm/impl/default-helm-client.js';
import {HelmExecutionBuilder} from '../../../../../src/integration/helm/execution/helm-execution-builder.js';
import {HelmExecution} from '../../../../../src/integration/helm/execution/helm-execution.js';
import {HelmExecutionException} from '../../../../../src/integration/helm/helm-execution-exception.js';
import {createResolverConfig} from '../../../../../src/core/config/resolver-config.js';
import {RecordingLogger} from '../../../fixtures/recording-logger.fixture.js';

describe('DefaultHelmClient', () => {
  let buildStub: SinonStub<[], HelmExecution>;
  let exitCode = 0;
  const builders: HelmExecutionBuilder[] = [];

  const client = new DefaultHelmClient(new RecordingLogger(), createResolverConfig({helmExecutable: '/opt/helm/helm'}));

  before(() => {
    buildStub = sinon.stub(HelmExecutionBuilder.prototype, 'build').callsFake(function (this: HelmExecutionBuilder) {
      builders.push(this);
      return new HelmExecution([process.execPath, '-e', `process.exit(${exitCode})`], process.cwd(), {});
    });
  });

  afterEach(() => {
    builders.length = 0;
    exitCode = 0;
    buildStub.resetHistory();
  });

  after(() => {
    buildStub.restore();
  });

  it('should run helm dependency update with the configured executable', async () => {
    await client.dependencyUpdate('/tmp/subchart-1', true);

    expect(buildStub).to.have.been.calledOnce;
    expect(builders[0].buildCommand()).to.deep.equal(['/opt/helm/helm', 'dependency', 'update', '/tmp/subchart-1']);
    expect(builders[0].environment()).to.deep.equal({HELM_EXPERIMENTAL_OCI: '1'});
  });

  it('should run helm package', async () => {
    await client.packageChart('/src/web', '/tmp/subchart-2');

    expect(builders[0].buildCommand()).to.deep.equal([
      '/opt/helm/helm',
      'package',
      '--destination',
      '/tmp/subchart-2',
      '/src/web',
    ]);
    expect(builders[0].environment()).to.deep.equal({});
  });

  it('should fail when helm exits with an error', async () => {
    exitCode = 1;

    await expect(client.packageChart('/src/web', '/tmp/subchart-2')).to.be.rejectedWith(HelmExecutionException);
  });
});
