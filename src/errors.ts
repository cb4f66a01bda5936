/**
 * Error taxonomy for commit message generation.
 *
 * Every definitive failure surfaced to the CLI or MCP layer extends
 * GenerationError. An empty-but-successful backend run is NOT an error:
 * the runner returns null and `generate()` resolves to "".
 *
 * @module errors
 */

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The working directory is not inside a git work tree. */
export class NotARepositoryError extends GenerationError {
  constructor(cwd: string) {
    super(`not a git directory: ${cwd}`);
  }
}

/** Nothing is staged, so there is nothing to describe. */
export class NoStagedChangesError extends GenerationError {
  constructor() {
    super("no staged diff content found");
  }
}

/** Invalid backend/model selection or no backend installed. */
export class ConfigError extends GenerationError {}

/** The backend executable could not be started or its pipes wired. */
export class LaunchError extends GenerationError {
  readonly backend: string;

  constructor(backend: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${backend} invocation failed to start: ${reason}`, { cause });
    this.backend = backend;
  }
}

/** Reading the backend's standard output failed part way through. */
export class StreamReadError extends GenerationError {
  readonly backend: string;

  constructor(backend: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${backend} output could not be read: ${reason}`, { cause });
    this.backend = backend;
  }
}

/**
 * The backend exited non-zero or reported an error event.
 * `diagnostics` holds captured stderr or the embedded error message.
 */
export class BackendExitError extends GenerationError {
  readonly backend: string;
  readonly exitCode: number | null;
  readonly diagnostics: string;

  constructor(backend: string, summary: string, exitCode: number | null, diagnostics: string) {
    super(diagnostics ? `${summary}\n${diagnostics}` : summary);
    this.backend = backend;
    this.exitCode = exitCode;
    this.diagnostics = diagnostics;
  }
}

/** A SIGINT/SIGTERM was forwarded to the backend during the run. */
export class InterruptedError extends GenerationError {
  readonly backend: string;
  readonly sessionId?: string;

  constructor(backend: string, sessionId?: string) {
    super(`${backend} invocation interrupted`);
    this.backend = backend;
    this.sessionId = sessionId;
  }
}
