// SPDX-License-Identifier: Apache-2.0

import {spawn, type ChildProcessWithoutNullStreams} from 'node:child_process';
import {HelmExecutionException} from '../helm-execution-exception.js';

/**
 * Represents the execution of a helm command. The process is started on construction and its output collected
 * until it exits.
 */
export class HelmExecution {
  private readonly process: ChildProcessWithoutNullStreams;
  private readonly completion: Promise<number>;

  private readonly output: string[] = [];
  private readonly errOutput: string[] = [];

  /**
   * Creates a new HelmExecution instance.
   * @param command The command array to execute, the executable first
   * @param workingDirectory The working directory for the process
   * @param environmentVariables The environment variables to set
   */
  public constructor(
    public readonly command: readonly string[],
    workingDirectory: string,
    environmentVariables: Record<string, string>,
  ) {
    const [executable, ...arguments_] = command;
    this.process = spawn(executable, arguments_, {
      cwd: workingDirectory,
      env: {...process.env, ...environmentVariables},
    });

    this.process.stdout.on('data', (d: Buffer) => {
      for (const item of d.toString().split(/\r?\n/)) {
        if (item) {
          this.output.push(item);
        }
      }
    });

    this.process.stderr.on('data', (d: Buffer) => {
      for (const item of d.toString().split(/\r?\n/)) {
        if (item) {
          this.errOutput.push(item.trim());
        }
      }
    });

    this.completion = new Promise<number>((resolve, reject) => {
      this.process.on('error', error => {
        reject(new HelmExecutionException(1, `Failed to start ${executable}: ${error.message}`, '', '', error));
      });
      this.process.on('close', code => {
        resolve(code ?? 1);
      });
    });
  }

  /**
   * Waits for the process to complete.
   * @returns A promise that resolves with the exit code when the process completes
   */
  public async waitFor(): Promise<number> {
    return this.completion;
  }

  /**
   * Gets the standard output of the process.
   * @returns standard output lines joined with new lines
   */
  public standardOutput(): string {
    return this.output.join('\n');
  }

  /**
   * Gets the standard error of the process.
   * @returns standard error lines joined with new lines
   */
  public standardError(): string {
    return this.errOutput.join('\n');
  }

  /**
   * Executes the command and waits for completion.
   * @returns A promise that resolves when the command completes successfully
   */
  public async call(): Promise<void> {
    const exitCode = await this.waitFor();
    if (exitCode !== 0) {
      throw new HelmExecutionException(
        exitCode,
        `Process exited with code ${exitCode}: ${this.standardError()}`,
        this.standardOutput(),
        this.standardError(),
      );
    }
  }
}
