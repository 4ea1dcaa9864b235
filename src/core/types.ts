/**
 * Shared core types.
 */

export interface Disposable {
  dispose(): void;
}

/**
 * Line-oriented sink that log output is appended to.
 */
export interface OutputChannel extends Disposable {
  appendLine(value: string): void;
}
