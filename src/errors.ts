export type AotImageErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_DESCRIPTOR'
  | 'COMPILE_FAILURE'
  | 'IO_FAILURE'
  | 'LAUNCH_FAILURE'
  | 'BINARY_NOT_FOUND'
  | 'MISSING_ENTRY_UNIT';

export class AotImageError extends Error {
  override name = 'AotImageError';
  readonly code: AotImageErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AotImageErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export class ConfigNotFoundError extends AotImageError {
  override name = 'ConfigNotFoundError';
  readonly searched: string[];

  constructor(searched: string[]) {
    super(
      'CONFIG_NOT_FOUND',
      `No deps.json descriptor found. Looked in: ${searched.join(', ')}`,
      { searched },
    );
    this.searched = searched;
  }
}

export class InvalidDescriptorError extends AotImageError {
  override name = 'InvalidDescriptorError';
  readonly file: string;

  constructor(file: string, reason: string) {
    super('INVALID_DESCRIPTOR', `Invalid configuration in ${file}: ${reason}`, { file });
    this.file = file;
  }
}

export class CompileFailureError extends AotImageError {
  override name = 'CompileFailureError';
  readonly unit: string;

  constructor(unit: string, cause: unknown) {
    super('COMPILE_FAILURE', `Failed to compile ${unit}: ${describeCause(cause)}`, { unit });
    this.unit = unit;
    this.cause = cause;
  }
}

export class IOFailureError extends AotImageError {
  override name = 'IOFailureError';
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('IO_FAILURE', `Could not prepare ${path}: ${describeCause(cause)}`, { path });
    this.path = path;
    this.cause = cause;
  }
}

export class LaunchFailureError extends AotImageError {
  override name = 'LaunchFailureError';
  readonly executable: string;

  constructor(executable: string, cause: unknown, homeEnv = 'GRAALVM_HOME') {
    super(
      'LAUNCH_FAILURE',
      `Could not launch ${executable}: ${describeCause(cause)}. ` +
        `Set $${homeEnv} or pass --native-image-path to point at a working native-image binary.`,
      { executable },
    );
    this.executable = executable;
    this.cause = cause;
  }
}

export function isAotImageError(err: unknown): err is AotImageError {
  return err instanceof AotImageError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
