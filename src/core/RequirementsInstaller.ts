import * as path from 'path';
import { DistLayout } from './DistLayout';
import { buildChildEnvironment } from './ProcessEnvironment';
import { runTool } from './ToolRunner';

export interface RequirementsOptions {
  timeout?: number;
  signal?: AbortSignal;
  baseEnv?: NodeJS.ProcessEnv;
}

export class RequirementsInstaller {
  /**
   * `pip install -r <manifest>` with the target's pip. The manifest is passed
   * through untouched; pip reports a missing or malformed file itself.
   */
  static async install(
    targetDir: string,
    manifest: string,
    options: RequirementsOptions = {}
  ): Promise<void> {
    const layout = new DistLayout(targetDir);

    await runTool(layout.marker, ['install', '-r', path.resolve(manifest), '--no-warn-script-location'], {
      cwd: layout.root,
      env: buildChildEnvironment(layout.root, options.baseEnv),
      label: 'pip',
      echo: true,
      ...(options.timeout !== undefined && { timeout: options.timeout }),
      ...(options.signal && { signal: options.signal }),
    });
  }
}
