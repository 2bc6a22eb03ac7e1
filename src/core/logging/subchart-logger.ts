// SPDX-License-Identifier: Apache-2.0

export interface SubchartLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  showUser(message: unknown, ...arguments_: unknown[]): void;

  /** Reports a non-fatal advisory to the user and records it as a warning */
  showUserWarning(message: string): void;

  showUserError(error: unknown): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;

  showList(title: string, items: string[]): void;
}
