import path from 'path';
import * as fs from 'fs-extra';
import { ZodError } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_SETTINGS, GitmarksSettings } from '../types/config.types';
import { GitmarksSettingsSchema } from '../types/config.schema';
import { BaseError, causeOf } from '../errors/base.error';

/**
 * Configuration management errors
 */
export class ConfigError extends BaseError {
  public readonly code = 'CONFIG_ERROR';
  public readonly recoverable = true;
}

export class ConfigValidationError extends BaseError {
  public readonly code = 'CONFIG_VALIDATION_ERROR';
  public readonly recoverable = true;
}

/**
 * Loads `.gitmarks.json` from a directory, falling back to the defaults
 */
export class ConfigManager {
  private readonly configPath: string;
  private cachedSettings?: GitmarksSettings | undefined;

  constructor(directory: string) {
    this.configPath = path.join(directory, CONFIG_FILE_NAME);
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  public async exists(): Promise<boolean> {
    return fs.pathExists(this.configPath);
  }

  /**
   * Load settings, validated and merged over DEFAULT_SETTINGS
   */
  public async load(): Promise<GitmarksSettings> {
    if (this.cachedSettings) {
      return this.cachedSettings;
    }

    if (!(await this.exists())) {
      this.cachedSettings = { ...DEFAULT_SETTINGS };
      return this.cachedSettings;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      throw new ConfigError(`Failed to read ${CONFIG_FILE_NAME}`, causeOf(error));
    }

    try {
      const parsed = GitmarksSettingsSchema.parse(JSON.parse(content));
      this.cachedSettings = { ...DEFAULT_SETTINGS, ...parsed };
      return this.cachedSettings;
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigValidationError(
          `Invalid ${CONFIG_FILE_NAME}`,
          this.formatIssues(error),
        );
      }
      throw new ConfigValidationError(`Invalid ${CONFIG_FILE_NAME}`, causeOf(error));
    }
  }

  private formatIssues(error: ZodError): string {
    return error.issues
      .map(issue => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
        return `${where}: ${issue.message}`;
      })
      .join('; ');
  }
}
