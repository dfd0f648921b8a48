/**
 * How untracked files are reported when the status snapshot is taken
 */
export type UntrackedFilesMode = 'all' | 'normal' | 'no';

/**
 * Repository status settings
 */
export interface GitmarksSettings {
  /** `all` lists every untracked file, `normal` collapses untracked directories, `no` hides them */
  untrackedFiles: UntrackedFilesMode;
  /** Git executable used by the repository provider */
  gitBinary: string;
  /** Kill a git process that produces no output for this long */
  timeoutMs: number;
  /** Hide entries on the ignore list when listing */
  hideIgnored: boolean;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  /** Hide ignored entries; overrides the configured `hideIgnored` */
  gitIgnore?: boolean;
  /** Skip repository discovery entirely */
  git?: boolean;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  message?: string;
  data?: unknown;
  exitCode: number;
}

export const DEFAULT_SETTINGS: Readonly<GitmarksSettings> = {
  untrackedFiles: 'all',
  gitBinary: 'git',
  timeoutMs: 10_000,
  hideIgnored: false,
};

export const CONFIG_FILE_NAME = '.gitmarks.json';

export const FALLBACK_VERSION = '0.1.0';
