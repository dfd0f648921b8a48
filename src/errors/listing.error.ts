import { BaseError } from './base.error';

/**
 * Directory to list could not be read
 */
export class DirectoryReadError extends BaseError {
  public readonly code = 'DIRECTORY_READ_ERROR';
  public readonly recoverable = false;
}
