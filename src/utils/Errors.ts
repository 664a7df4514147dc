export type ErrorCode =
  | 'INVALID_FORMAT'
  | 'NOT_FOUND'
  | 'FETCH_FAILED'
  | 'EXTRACTION_FAILED'
  | 'COPY_FAILED'
  | 'PATCH_FAILED'
  | 'TOOL_EXECUTION_FAILED'
  | 'MISSING_ENVIRONMENT'
  | 'VERSION_MISMATCH'
  | 'MANIFEST_INVALID';

/**
 * Base class for every failure the build can raise.
 * None of them are recovered from; they unwind to the command.
 */
export abstract class EmbedpyError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class InvalidFormatError extends EmbedpyError {
  override readonly code = 'INVALID_FORMAT';
  readonly input: string;

  constructor(input: string) {
    super(`Version must be of the format X.Y.Z (e.g. 3.9.7), got '${input}'`);
    this.input = input;
  }
}

export class NotFoundError extends EmbedpyError {
  override readonly code = 'NOT_FOUND';
  readonly target: string;
  readonly variable: string;

  constructor(target: string, variable: string) {
    super(`Could not find any ${target}/libs in ${variable}`);
    this.target = target;
    this.variable = variable;
  }
}

export class FetchError extends EmbedpyError {
  override readonly code = 'FETCH_FAILED';
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, reason: string, status?: number, cause?: unknown) {
    super(`Failed to download ${url}: ${reason}`, cause);
    this.url = url;
    this.status = status;
  }
}

export class ExtractionError extends EmbedpyError {
  override readonly code = 'EXTRACTION_FAILED';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to extract archive into ${path}: ${describeCause(cause)}`, cause);
    this.path = path;
  }
}

export class CopyError extends EmbedpyError {
  override readonly code = 'COPY_FAILED';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Failed to copy ${path}: ${describeCause(cause)}`, cause);
    this.path = path;
  }
}

export class PatchError extends EmbedpyError {
  override readonly code = 'PATCH_FAILED';
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to patch ${path}: ${reason}`, cause);
    this.path = path;
  }
}

export class ToolExecutionError extends EmbedpyError {
  override readonly code = 'TOOL_EXECUTION_FAILED';
  readonly command: string;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    details: { exitCode: number | null; stdout?: string; stderr?: string; reason?: string },
    cause?: unknown
  ) {
    const reason =
      details.reason ?? (details.exitCode === null ? 'did not exit' : `exit code ${details.exitCode}`);
    super(`${command} failed (${reason})`, cause);
    this.command = command;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }
}

export class MissingEnvironmentError extends EmbedpyError {
  override readonly code = 'MISSING_ENVIRONMENT';
  readonly variable: string;

  constructor(variable: string) {
    super(`Missing ${variable} environment variable`);
    this.variable = variable;
  }
}

export class VersionMismatchError extends EmbedpyError {
  override readonly code = 'VERSION_MISMATCH';
  readonly expected: string;
  readonly found: string;

  constructor(targetDir: string, expected: string, found: string) {
    super(
      `${targetDir} already holds Python ${found} but ${expected} was requested; remove the directory to rebuild`
    );
    this.expected = expected;
    this.found = found;
  }
}

export class ManifestError extends EmbedpyError {
  override readonly code = 'MANIFEST_INVALID';
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to read build manifest at ${path}: ${reason}`, cause);
    this.path = path;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'Unknown error';
}
