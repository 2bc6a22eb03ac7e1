// SPDX-License-Identifier: Apache-2.0

export class SubchartError extends Error {
  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause !== undefined && cause !== null) {
      this.cause = cause;
      if (cause instanceof Error) {
        this.stack += `\nCaused by: ${cause.stack}`;
      }
    }
  }
}
