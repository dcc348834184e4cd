/**
 * archdocs のエラー種別
 */

export type ArchdocsErrorKind =
  | 'InvalidName'
  | 'InvalidInput'
  | 'Conflict'
  | 'NotFound'
  | 'HistoryUnavailable'
  | 'StorageUnavailable';

/**
 * CLIの終了コード（種別ごとに固有）
 */
export const EXIT_CODES: Record<ArchdocsErrorKind, number> = {
  InvalidName: 2,
  Conflict: 3,
  NotFound: 4,
  HistoryUnavailable: 5,
  StorageUnavailable: 6,
  InvalidInput: 7,
};

/**
 * すべての操作エラーの基底クラス
 */
export abstract class ArchdocsError extends Error {
  abstract readonly kind: ArchdocsErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

export class InvalidNameError extends ArchdocsError {
  readonly kind = 'InvalidName';

  constructor(
    public readonly input: string,
    reason: string
  ) {
    super(`Invalid name '${input}': ${reason}`);
  }
}

export class InvalidInputError extends ArchdocsError {
  readonly kind = 'InvalidInput';

  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
  }
}

export class ConflictError extends ArchdocsError {
  readonly kind = 'Conflict';

  constructor(public readonly documentName: string) {
    super(`Document '${documentName}' already exists. Use --update to modify it.`);
  }
}

export class NotFoundError extends ArchdocsError {
  readonly kind = 'NotFound';

  constructor(public readonly documentName: string) {
    super(`Document '${documentName}' not found`);
  }
}

export class HistoryUnavailableError extends ArchdocsError {
  readonly kind = 'HistoryUnavailable';

  constructor(
    public readonly storageRoot: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`History repository at ${storageRoot} is unavailable: ${detail}`, options);
  }
}

export class StorageUnavailableError extends ArchdocsError {
  readonly kind = 'StorageUnavailable';

  constructor(
    public readonly location: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Storage at ${location} is unavailable: ${detail}`, options);
  }
}

/**
 * ArchdocsErrorかどうか
 */
export function isArchdocsError(error: unknown): error is ArchdocsError {
  return error instanceof ArchdocsError;
}

/**
 * Node.jsのファイルシステムエラーかどうか
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
