import * as path from 'path';
import { VersionTriple } from '../types/Dist';
import { MissingEnvironmentError, NotFoundError } from '../utils/Errors';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';
import { DistLayout } from './DistLayout';

const SEARCH_VARIABLE = 'PATH';

export class HostLibraryLocator {
  /**
   * `Python` + major + minor with no padding, so 3.9 and 3.10 give Python39 and Python310.
   */
  static dirName(version: VersionTriple): string {
    return `Python${version.major}${version.minor}`;
  }

  /**
   * First PATH entry named after the version that has a `libs` directory.
   * Entries that match by name but lack `libs` are passed over.
   */
  static async locate(
    version: VersionTriple,
    env: NodeJS.ProcessEnv = process.env
  ): Promise<string> {
    const target = this.dirName(version);
    const searchPath = readVariable(env, SEARCH_VARIABLE);
    if (searchPath === undefined) {
      throw new MissingEnvironmentError(SEARCH_VARIABLE);
    }

    for (const entry of searchPath.split(path.delimiter)) {
      if (!entry || path.basename(entry) !== target) {
        continue;
      }

      const candidate = path.join(entry, DistLayout.LIBS_DIR);
      if (await FileSystem.isDirectory(candidate)) {
        logger.debug(`Using host libraries from ${candidate}`);
        return candidate;
      }
      logger.debug(`${entry} matches ${target} but has no ${DistLayout.LIBS_DIR} directory`);
    }

    throw new NotFoundError(target, SEARCH_VARIABLE);
  }
}

/** Environment maps copied out of process.env lose Windows' case-insensitive lookup */
export function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  if (env[name] !== undefined) {
    return env[name];
  }
  const key = Object.keys(env).find(candidate => candidate.toUpperCase() === name.toUpperCase());
  return key === undefined ? undefined : env[key];
}
