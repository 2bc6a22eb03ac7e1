// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {injectable} from 'tsyringe-neo';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ChartFileSystem} from './chart-file-system.js';

@injectable()
export class NodeChartFileSystem implements ChartFileSystem {
  public isDirectory(path: string): boolean {
    return fs.statSync(path, {throwIfNoEntry: false})?.isDirectory() ?? false;
  }

  public isFile(path: string): boolean {
    return fs.statSync(path, {throwIfNoEntry: false})?.isFile() ?? false;
  }

  public list(directory: string): string[] {
    return fs.readdirSync(directory, {encoding: 'utf8'}).sort();
  }

  public readText(path: string): string {
    return fs.readFileSync(path, 'utf8');
  }

  public writeText(path: string, content: string): void {
    fs.writeFileSync(path, content, {encoding: 'utf8', flag: 'w'});
  }

  public makeDirectory(directory: string): void {
    fs.mkdirSync(directory, {recursive: true});
  }

  public remove(path: string): void {
    fs.rmSync(path, {recursive: true, force: true});
  }

  public copy(source: string, destination: string): void {
    fs.cpSync(source, destination, {recursive: true, errorOnExist: true, force: false});
  }

  public move(source: string, destination: string): void {
    try {
      fs.renameSync(source, destination);
    } catch (error) {
      // rename does not cross devices, the scratch directory may live on another one
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        const staging = `${destination}.partial-${process.pid}`;
        try {
          fs.cpSync(source, staging, {recursive: true});
          fs.renameSync(staging, destination);
        } finally {
          fs.rmSync(staging, {recursive: true, force: true});
        }
        fs.rmSync(source, {recursive: true, force: true});
        return;
      }
      throw error;
    }
  }

  public makeTemporaryDirectory(prefix: string): string {
    return fs.mkdtempSync(PathEx.join(os.tmpdir(), prefix));
  }

  public touch(path: string): void {
    const now = new Date();
    if (fs.existsSync(path)) {
      fs.utimesSync(path, now, now);
    } else {
      fs.closeSync(fs.openSync(path, 'a'));
    }
  }
}
