// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * This file should only contain the function to get the subchart version.
 */
export function getSubchartVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  let directory: string = path.dirname(__filename);

  // the compiled file lives one level deeper, in dist/
  for (let depth = 0; depth < 2; depth++) {
    const packageJsonPath: string = PathEx.join(directory, 'package.json');
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return String(packageJson.version);
      }
    }
    directory = path.dirname(directory);
  }
  return '0.0.0';
}
