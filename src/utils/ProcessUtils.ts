import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';
import { logger } from './Logger';

export interface ProcessOptions {
  cwd?: string;
  /** Complete environment for the child; defaults to a copy of process.env */
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the process tree is killed; 0 or absent waits indefinitely */
  timeout?: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Set when the child was killed because of a timeout or an abort */
  terminated?: 'timeout' | 'aborted';
}

export class ProcessUtils {
  /**
   * Run a command to completion and capture both streams.
   * Resolves whatever the exit code; rejects only when the process cannot be spawned.
   */
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: options.env ?? { ...process.env },
        shell: false,
        stdio: 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let terminated: ProcessResult['terminated'];
      let timer: NodeJS.Timeout | undefined;

      const terminate = (reason: 'timeout' | 'aborted') => {
        if (terminated || child.pid === undefined) return;
        terminated = reason;
        ProcessUtils.killProcess(child.pid).catch(error => {
          logger.warn(`Could not kill ${command} (pid ${child.pid})`, error);
        });
      };

      const onAbort = () => terminate('aborted');

      if (options.timeout && options.timeout > 0) {
        timer = setTimeout(() => terminate('timeout'), options.timeout);
      }

      if (options.signal) {
        if (options.signal.aborted) {
          onAbort();
        } else {
          options.signal.addEventListener('abort', onAbort, { once: true });
        }
      }

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        cleanup();
        resolve({
          stdout,
          stderr,
          exitCode: code,
          ...(terminated && { terminated }),
        });
      });

      child.on('error', (error: Error) => {
        cleanup();
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  static async killProcess(pid: number, signal: string = 'SIGTERM'): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(new Error(`Failed to kill process ${pid}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  static formatCommand(command: string, args: string[]): string {
    return [command, ...args].map(part => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
  }
}
