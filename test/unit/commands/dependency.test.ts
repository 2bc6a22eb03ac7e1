// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import yargs from 'yargs';
import {DependencyCommand} from '../../../src/commands/dependency.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import * as constants from '../../../src/core/constants.js';
import {SubchartError} from '../../../src/core/errors/subchart-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {type ArgvStruct} from '../../../src/types/aliases.js';
import {ResolverHarness} from '../fixtures/resolver-harness.fixture.js';
import {writeChart} from '../fixtures/chart-archive.fixture.js';

function argvOf(values: Record<string, unknown>): ArgvStruct {
  return {_: ['dependency', 'update'], $0: 'subchart', ...values};
}

describe('DependencyCommand', () => {
  describe('toUpdateRequest', () => {
    it('should default to the current directory and no sources', () => {
      expect(DependencyCommand.toUpdateRequest(argvOf({}))).to.deep.equal({
        chartPath: '.',
        sourcePaths: [],
        force: false,
        remove: true,
        touch: undefined,
        experimentalOci: constants.EXPERIMENTAL_OCI,
      });
    });

    it('should read every flag', () => {
      const request = DependencyCommand.toUpdateRequest(
        argvOf({
          chart: '/work/app',
          package: ['/src/db', '/src/web'],
          force: true,
          remove: false,
          touch: 'deps.stamp',
          'experimental-oci': false,
        }),
      );

      expect(request).to.deep.equal({
        chartPath: '/work/app',
        sourcePaths: ['/src/db', '/src/web'],
        force: true,
        remove: false,
        touch: 'deps.stamp',
        experimentalOci: false,
      });
    });

    it('should read no sources when yargs parses a command line without --package', async () => {
      const argv = await flags
        .setOptionalCommandFlags(yargs(['--force']), flags.packages, flags.force, flags.experimentalOci)
        .parseAsync();

      expect(argv.package).to.be.undefined;
      expect(flags.readStringArray(argv, flags.packages)).to.deep.equal([]);
      expect(flags.readBoolean(argv, flags.force)).to.be.true;
    });

    it('should read --no-experimental-oci parsed by yargs', async () => {
      const argv = await flags.setOptionalCommandFlags(yargs(['--no-experimental-oci']), flags.experimentalOci).parseAsync();

      expect(flags.readBoolean(argv, flags.experimentalOci)).to.be.false;
    });

    it('should accept a single package', () => {
      expect(DependencyCommand.toUpdateRequest(argvOf({package: '/src/db'})).sourcePaths).to.deep.equal(['/src/db']);
    });

    it('should reject values of the wrong type', () => {
      expect(() => flags.readBoolean(argvOf({force: 'yes'}), flags.force)).to.throw(
        IllegalArgumentError,
        '--force must be a boolean',
      );
      expect(() => flags.readStringArray(argvOf({package: [42]}), flags.packages)).to.throw(
        IllegalArgumentError,
        '--package must be a list of paths',
      );
    });
  });

  describe('update', () => {
    const db = {name: 'db', version: '3.1.0'};
    let harness: ResolverHarness;
    let command: DependencyCommand;

    beforeEach(() => {
      harness = new ResolverHarness();
      writeChart(harness.fileSystem, '/work/app', {name: 'app', version: '1.0.0', dependencies: [db]});
      harness.fileSystem.writeFile('/work/app/charts/old-0.1.0.tgz', 'stale');
      command = new DependencyCommand(harness.updater, harness.logger);
    });

    it('should run the same steps as the updater', () => {
      expect(command.updateTasks().map(task => task.title)).to.deep.equal([
        'Resolve dependencies',
        'Remove unneeded archives',
        'Touch marker file',
      ]);
      expect(harness.updater.steps().map(step => step.title)).to.deep.equal(
        command.updateTasks().map(task => task.title),
      );
    });

    it('should update the dependencies and report the removed archives', async () => {
      harness.fetcher.publish(db);

      expect(await command.update(argvOf({chart: '/work/app', remove: true}))).to.be.true;

      expect(harness.fileSystem.list('/work/app/charts')).to.deep.equal(['db-3.1.0.tgz']);
      expect(harness.logger.messages('user')).to.have.lengthOf(2);
      expect(harness.logger.messages('user')[0]).to.equal('Removed archives: /work/app/charts/old-0.1.0.tgz');
      expect(harness.logger.messages('user')[1]).to.contain('Updated the dependencies of app-1.0.0');
    });

    it('should report up to date dependencies', async () => {
      harness.fetcher.publish(db);
      await command.update(argvOf({chart: '/work/app'}));
      harness.logger.records.length = 0;

      expect(await command.update(argvOf({chart: '/work/app'}))).to.be.false;

      expect(harness.logger.messages('user')).to.have.lengthOf(1);
      expect(harness.logger.messages('user')[0]).to.contain('The dependencies of app-1.0.0 are up to date');
    });

    it('should wrap a failed update', async () => {
      try {
        await command.update(argvOf({chart: '/work/app'}));
        expect.fail('expected the update to fail');
      } catch (error) {
        expect(error).to.be.instanceof(SubchartError);
        if (error instanceof SubchartError) {
          expect(error.message).to.equal('Error updating the dependencies of /work/app');
        }
      }
      expect(harness.fileSystem.list('/work/app/charts')).to.deep.equal(['old-0.1.0.tgz']);
    });
  });
});
