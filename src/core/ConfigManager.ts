import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { ConfigFile, EmbedpyConfig, LogLevel } from '../types/Config';
import { ARCHITECTURES, Architecture } from '../types/Dist';
import { DEFAULT_DISTRIBUTION_BASE_URL } from './DistributionFetcher';
import { DEFAULT_GET_PIP_URL } from './InstallerBootstrapper';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class ConfigManager {
  private static instance: ConfigManager;
  private readonly configDir: string;
  private readonly configPath: string;
  private config: EmbedpyConfig | null = null;

  constructor(configDir: string = path.join(os.homedir(), '.embedpy')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Settings from config.yml laid over the defaults. A missing file means defaults.
   */
  async loadConfig(): Promise<EmbedpyConfig> {
    if (this.config) {
      return this.config;
    }

    if (!(await fs.pathExists(this.configPath))) {
      this.config = ConfigManager.createDefaultConfig();
      return this.config;
    }

    try {
      const content = await fs.readFile(this.configPath, 'utf8');
      const parsed: unknown = yaml.parse(content);
      this.config = this.validateConfig(isConfigFile(parsed) ? parsed : {});
      return this.config;
    } catch (error) {
      throw new Error(
        `Failed to load config at ${this.configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  async saveConfig(config: EmbedpyConfig): Promise<void> {
    await fs.ensureDir(this.configDir);

    try {
      const file: ConfigFile = { settings: config };
      const content = yaml.stringify(file, {
        indent: 2,
        lineWidth: 100,
        minContentWidth: 0,
      });

      await fs.writeFile(this.configPath, content, 'utf8');
      this.config = config;
    } catch (error) {
      throw new Error(
        `Failed to save config at ${this.configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  static createDefaultConfig(): EmbedpyConfig {
    return {
      logLevel: 'info',
      hostPython: 'python',
      architecture: 'amd64',
      distributionBaseUrl: DEFAULT_DISTRIBUTION_BASE_URL,
      getPipUrl: DEFAULT_GET_PIP_URL,
      downloadTimeout: 0,
      processTimeout: 0,
      defaultOutputDir: 'pydist',
    };
  }

  /**
   * Unknown keys are dropped; a setting with the wrong type is an error rather than a silent default.
   */
  private validateConfig(file: ConfigFile): EmbedpyConfig {
    const defaults = ConfigManager.createDefaultConfig();
    const settings = file.settings ?? {};
    const config: EmbedpyConfig = { ...defaults };

    if (settings.logLevel !== undefined) {
      config.logLevel = expectOneOf('logLevel', settings.logLevel, LOG_LEVELS);
    }
    if (settings.architecture !== undefined) {
      config.architecture = expectOneOf<Architecture>(
        'architecture',
        settings.architecture,
        ARCHITECTURES
      );
    }
    if (settings.hostPython !== undefined) {
      config.hostPython = expectString('hostPython', settings.hostPython);
    }
    if (settings.distributionBaseUrl !== undefined) {
      config.distributionBaseUrl = expectString('distributionBaseUrl', settings.distributionBaseUrl);
    }
    if (settings.getPipUrl !== undefined) {
      config.getPipUrl = expectString('getPipUrl', settings.getPipUrl);
    }
    if (settings.defaultOutputDir !== undefined) {
      config.defaultOutputDir = expectString('defaultOutputDir', settings.defaultOutputDir);
    }
    if (settings.downloadTimeout !== undefined) {
      config.downloadTimeout = expectTimeout('downloadTimeout', settings.downloadTimeout);
    }
    if (settings.processTimeout !== undefined) {
      config.processTimeout = expectTimeout('processTimeout', settings.processTimeout);
    }

    return config;
  }
}

function isConfigFile(value: unknown): value is ConfigFile {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const settings: unknown = Reflect.get(value, 'settings');
  return settings === undefined || (typeof settings === 'object' && settings !== null);
}

function expectString(key: string, value: unknown): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`'${key}' must be a non-empty string`);
  }
  return value;
}

function expectTimeout(key: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`'${key}' must be a whole number of milliseconds (0 disables it)`);
  }
  return value;
}

function expectOneOf<T extends string>(key: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw new Error(`'${key}' must be one of ${allowed.join(', ')}`);
  }
  return match;
}
