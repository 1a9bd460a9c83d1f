/**
 * Configuration Service
 *
 * Loads optional overrides from .preflight/config.yaml in the working directory.
 * The required artifacts and tables are not configurable; only the runtime
 * to use, the minimum host runtime version, extra compiler flags, the launch
 * command shown on success and the log level are.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError, summarizeError } from '../../core/errors.js';
import { LogLevelName } from '../../core/logger.js';
import { PreflightConfig, PreflightConfigSchema, formatIssues } from '../../core/schemas.js';
import { VersionTriple, parseVersion } from '../../core/version.js';
import { CLANG_RUNTIME_SPECIFIER } from '../probe/clang-runtime.js';

export const CONFIG_DIR = '.preflight';
export const CONFIG_FILE = 'config.yaml';

/**
 * Fully resolved settings for one run
 */
export interface PreflightSettings {
  runtimeModule: string;
  minimumVersion: VersionTriple;
  extraCflags: string[];
  launchCommand: string;
  logLevel: LogLevelName;
}

export const DEFAULT_SETTINGS: Readonly<PreflightSettings> = Object.freeze({
  runtimeModule: CLANG_RUNTIME_SPECIFIER,
  minimumVersion: { major: 20, minor: 0, patch: 0 },
  extraCflags: [],
  launchCommand: 'sudo node detector.js',
  logLevel: 'warn'
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ConfigService {
  private configPath: string;
  private cachedConfig: PreflightConfig | null = null;

  constructor(options: { cwd?: string; baseDir?: string } = {}) {
    const cwd = options.cwd ?? process.cwd();
    this.configPath = path.join(cwd, options.baseDir ?? CONFIG_DIR, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load and validate the config file, with caching. A missing file is an
   * empty config; an unreadable or invalid one is a ConfigError.
   */
  private async loadConfig(): Promise<PreflightConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw new ConfigError(`Cannot read config: ${summarizeError(error)}`, this.configPath);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigError(`Invalid YAML: ${summarizeError(error)}`, this.configPath);
    }

    const result = PreflightConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(`Invalid config: ${formatIssues(result.error)}`, this.configPath);
    }

    this.cachedConfig = result.data;
    return this.cachedConfig;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Config values over defaults
   */
  async getSettings(): Promise<PreflightSettings> {
    const config = await this.loadConfig();

    return {
      runtimeModule: config.runtime?.module ?? DEFAULT_SETTINGS.runtimeModule,
      minimumVersion: config.runtime?.minimumVersion
        ? parseVersion(config.runtime.minimumVersion)
        : { ...DEFAULT_SETTINGS.minimumVersion },
      extraCflags: config.compile?.extraCflags ?? [...DEFAULT_SETTINGS.extraCflags],
      launchCommand: config.agent?.launchCommand ?? DEFAULT_SETTINGS.launchCommand,
      logLevel: config.log?.level ?? DEFAULT_SETTINGS.logLevel
    };
  }
}
