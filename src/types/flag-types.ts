// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | string[];
  alias?: string;
  type?: 'boolean' | 'string' | 'array';
  string?: boolean;
}
