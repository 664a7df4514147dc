import { Architecture } from './Dist';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface EmbedpyConfig {
  logLevel: LogLevel;
  /** Interpreter probed when no version is given */
  hostPython: string;
  architecture: Architecture;
  distributionBaseUrl: string;
  getPipUrl: string;
  /** Milliseconds; 0 waits indefinitely */
  downloadTimeout: number;
  /** Milliseconds; 0 waits indefinitely */
  processTimeout: number;
  defaultOutputDir: string;
}

export interface ConfigFile {
  settings?: Partial<EmbedpyConfig>;
}
