import { FetchError } from '../utils/Errors';
import { FileSystem } from '../utils/FileSystem';
import { HttpClient } from '../utils/HttpClient';
import { logger } from '../utils/Logger';
import { DistLayout } from './DistLayout';
import { buildChildEnvironment } from './ProcessEnvironment';
import { runTool } from './ToolRunner';

export const DEFAULT_GET_PIP_URL = 'https://bootstrap.pypa.io/get-pip.py';

export interface BootstrapOptions {
  getPipUrl?: string;
  downloadTimeout?: number;
  processTimeout?: number;
  signal?: AbortSignal;
  /** Parent environment the child's is derived from */
  baseEnv?: NodeJS.ProcessEnv;
}

export class InstallerBootstrapper {
  /**
   * Fetch get-pip.py into the target and run it with the target's own interpreter.
   * Returns the path of the pip executable it produced.
   */
  static async bootstrap(targetDir: string, options: BootstrapOptions = {}): Promise<string> {
    const layout = new DistLayout(targetDir);
    const url = options.getPipUrl ?? DEFAULT_GET_PIP_URL;

    const script = await HttpClient.download(url, {
      ...(options.downloadTimeout !== undefined && { timeout: options.downloadTimeout }),
      ...(options.signal && { signal: options.signal }),
    });

    try {
      await FileSystem.writeBuffer(layout.bootstrapScript, script);
    } catch (error) {
      throw new FetchError(
        url,
        `could not be saved to ${layout.bootstrapScript}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        undefined,
        error
      );
    }

    await runTool(layout.interpreter, [layout.bootstrapScript, '--no-warn-script-location'], {
      cwd: layout.root,
      env: buildChildEnvironment(layout.root, options.baseEnv),
      label: 'get-pip',
      echo: true,
      ...(options.processTimeout !== undefined && { timeout: options.processTimeout }),
      ...(options.signal && { signal: options.signal }),
    });

    await this.removeScript(layout.bootstrapScript);
    return layout.marker;
  }

  static async isBootstrapped(targetDir: string): Promise<boolean> {
    return FileSystem.pathExists(new DistLayout(targetDir).marker);
  }

  private static async removeScript(scriptPath: string): Promise<void> {
    try {
      await FileSystem.deleteFile(scriptPath);
    } catch (error) {
      logger.warn(`Could not remove ${scriptPath}`, error);
    }
  }
}
