/**
 * Base class for failures the wrapper itself detects. Each carries the exit
 * status the process should end with.
 *
 * `reported` is set when the user has already seen the underlying tool's own
 * diagnostics, so the entry point should not print anything further.
 */
export class WrapperError extends Error {
  readonly exitCode: number;
  readonly reported: boolean;

  constructor(message: string, exitCode: number, reported = false) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
    this.reported = reported;
  }
}

export class ConfigError extends WrapperError {
  readonly variable: string;

  constructor(variable: string, detail: string) {
    super(`Invalid ${variable}: ${detail}`, 2);
    this.variable = variable;
  }
}

export class RuntimeNotFoundError extends WrapperError {
  readonly runtime: string;
  readonly setupInstructions: string[];

  constructor(runtime: string, setupInstructions: string[] = [], message?: string) {
    super(message ?? `Container runtime "${runtime}" is not installed or not in PATH`, 127);
    this.runtime = runtime;
    this.setupInstructions = setupInstructions;
  }
}

// Build failures: the runtime already printed its diagnostics on stderr.
export class ImageBuildError extends WrapperError {
  constructor(exitCode: number) {
    if (exitCode === 0) {
      super('Image build succeeded but printed no image identifier', 1);
    } else {
      super(`Image build failed with exit code ${exitCode}`, exitCode, true);
    }
  }
}
