export type BranchExceptionKind = 'repository-not-found' | 'no-branches-found' | 'operation-failed';

export abstract class BranchPickerException extends Error {
  abstract readonly kind: BranchExceptionKind;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * No git working tree at the path or any of its parents
 */
export class RepositoryNotFoundException extends BranchPickerException {
  override readonly kind = 'repository-not-found';

  constructor(
    public readonly searchPath: string,
    cause?: unknown
  ) {
    super(`Not a git repository: ${searchPath}`, cause);
  }
}

export class NoBranchesFoundException extends BranchPickerException {
  override readonly kind = 'no-branches-found';

  constructor(message: string = 'No branches found in repository') {
    super(message);
  }
}

/**
 * Any failure reported by git itself: unknown refs, checkout conflicts and the like.
 */
export class OperationFailedException extends BranchPickerException {
  override readonly kind = 'operation-failed';

  constructor(
    public readonly operation: string,
    message: string,
    cause?: unknown
  ) {
    super(message, cause);
  }

  static wrap(operation: string, error: unknown, context?: string): OperationFailedException {
    if (error instanceof OperationFailedException) return error;
    const detail = error instanceof Error ? error.message.trim() : String(error);
    const message = context ? `${context}: ${detail}` : detail;
    return new OperationFailedException(operation, message, error);
  }
}

export type BranchException =
  | RepositoryNotFoundException
  | NoBranchesFoundException
  | OperationFailedException;

export const isBranchException = (error: unknown): error is BranchException =>
  error instanceof RepositoryNotFoundException ||
  error instanceof NoBranchesFoundException ||
  error instanceof OperationFailedException;
