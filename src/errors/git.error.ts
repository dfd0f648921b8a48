import { BaseError } from './base.error';

/**
 * No repository encloses the starting path
 */
export class RepositoryNotFoundError extends BaseError {
  public readonly code = 'REPOSITORY_NOT_FOUND';
  public readonly recoverable = false;
}

/**
 * Repository has no usable working directory (bare repository, or toplevel lookup failed)
 */
export class WorkingDirectoryError extends BaseError {
  public readonly code = 'NO_WORKING_DIRECTORY';
  public readonly recoverable = false;
}

/**
 * Listing the repository's file statuses failed
 */
export class StatusEnumerationError extends BaseError {
  public readonly code = 'STATUS_ENUMERATION_FAILED';
  public readonly recoverable = false;
}

/**
 * Evaluating ignore rules for a path failed
 */
export class IgnoreQueryError extends BaseError {
  public readonly code = 'IGNORE_QUERY_FAILED';
  public readonly recoverable = true;
  public readonly path: string;

  constructor(message: string, path: string, details?: string) {
    super(message, details);
    this.path = path;
  }
}
