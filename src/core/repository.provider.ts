import { RawStatusEntry } from '../types/status.types';

/**
 * An open repository as seen through the provider.
 * Implementations need not be safe for concurrent use.
 */
export interface RepositorySession {
  /** Absolute working directory root, or null for a bare repository */
  workingDirectory(): Promise<string | null>;
  /** Every path with a non-clean status, relative to the working directory */
  enumerateStatuses(): Promise<RawStatusEntry[]>;
  /** Whether ignore rules match the path; rejects when they cannot be evaluated */
  isIgnored(targetPath: string): Promise<boolean>;
}

/**
 * Version-control capability the status layer is built on
 */
export interface RepositoryProvider {
  /** Search the path and its ancestors for a repository */
  discover(startingPath: string): Promise<RepositorySession | null>;
}
