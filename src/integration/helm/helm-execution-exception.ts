// SPDX-License-Identifier: Apache-2.0

/**
 * Exception thrown when the execution of the Helm executable fails.
 */
export class HelmExecutionException extends Error {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = 'Execution of the Helm command failed with exit code: %d';

  /**
   * Constructs a new exception instance.
   * @param exitCode The non-zero exit code returned by the Helm executable or the operating system
   * @param message The detail message, defaults to a message naming the exit code
   * @param stdOut The standard output of the Helm executable
   * @param stdErr The standard error of the Helm executable
   * @param cause The underlying error, when the process could not be started
   */
  public constructor(
    public readonly exitCode: number,
    message?: string,
    public readonly stdOut: string = '',
    public readonly stdErr: string = '',
    cause?: Error,
  ) {
    super(message ?? HelmExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()));
    this.name = 'HelmExecutionException';
    if (cause) {
      this.cause = cause;
    }
  }

  /**
   * Returns a string representation of the exception.
   * @returns A string representation of the exception
   */
  public override toString(): string {
    return `HelmExecutionException{message=${this.message}, exitCode=${this.exitCode}, stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`;
  }
}
