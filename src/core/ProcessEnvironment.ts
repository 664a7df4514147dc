import * as path from 'path';
import { DistLayout } from './DistLayout';

/**
 * Environment handed to the target's interpreter and pip: the parent's variables,
 * with PATH replaced by the target directory and its Scripts directory.
 * process.env itself is never touched.
 */
export function buildChildEnvironment(
  targetDir: string,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(base)) {
    // Windows spells it Path; two spellings in one block make the winner unpredictable
    if (key.toUpperCase() === 'PATH') continue;
    env[key] = value;
  }

  env.PATH = searchPathFor(targetDir);
  return env;
}

export function searchPathFor(targetDir: string): string {
  const layout = new DistLayout(targetDir);
  return [layout.root, layout.scriptsDir].join(path.delimiter);
}
