// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {HelmExecutionBuilder} from '../../../../../src/integration/helm/execution/helm-execution-builder.js';
import {RecordingLogger} from '../../../fixtures/recording-logger.fixture.js';

describe('HelmExecutionBuilder', () => {
  const logger = new RecordingLogger();

  it('should require an executable', () => {
    expect(() => new HelmExecutionBuilder(' ', logger)).to.throw('helmExecutable must not be blank');
  });

  it('Test argument null checks', () => {
    const builder = new HelmExecutionBuilder('helm', logger);
    expect(() => builder.argument('', 'value')).to.throw('name must not be null');
    expect(() => builder.argument('destination', '')).to.throw('value must not be null');
  });

  it('Test environmentVariable null checks', () => {
    const builder = new HelmExecutionBuilder('helm', logger);
    expect(() => builder.environmentVariable('', 'value')).to.throw('name must not be null');
    expect(() => builder.environmentVariable('HELM_DEBUG', '')).to.throw('value must not be null');
  });

  it('should put subcommands, then arguments, then positionals', () => {
    const command = new HelmExecutionBuilder('helm', logger)
      .positional('/src/web')
      .argument('destination', '/tmp/out')
      .subcommands('package')
      .buildCommand();

    expect(command).to.deep.equal(['helm', 'package', '--destination', '/tmp/out', '/src/web']);
  });
});
