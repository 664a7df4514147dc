import { VersionTriple } from '../types/Dist';
import { PatchError } from '../utils/Errors';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';
import { DistLayout } from './DistLayout';

const COMMENTED_DIRECTIVE = '#import site';
const ACTIVE_DIRECTIVE = 'import site';
const ACTIVE_LINE = /^import site[ \t]*\r?$/m;

export type PatchOutcome = 'patched' | 'alreadyActive';

export interface PatchResult {
  path: string;
  outcome: PatchOutcome;
}

/**
 * The embeddable build ships its ._pth with `#import site`, which leaves
 * site-packages off sys.path and breaks pip.
 */
export class ImportSitePatcher {
  static async enableImportSite(targetDir: string, version: VersionTriple): Promise<PatchResult> {
    const pthPath = new DistLayout(targetDir).pthFile(version);

    if (!(await FileSystem.pathExists(pthPath))) {
      throw new PatchError(pthPath, 'file not found');
    }

    let contents: string;
    try {
      contents = await FileSystem.readText(pthPath);
    } catch (error) {
      throw new PatchError(pthPath, 'could not be read', error);
    }

    const patched = this.patchContents(contents);
    if (patched === null) {
      if (ACTIVE_LINE.test(contents)) {
        logger.debug(`${pthPath} already has import site enabled`);
        return { path: pthPath, outcome: 'alreadyActive' };
      }
      throw new PatchError(pthPath, `no '${COMMENTED_DIRECTIVE}' directive`);
    }

    try {
      await FileSystem.writeText(pthPath, patched);
    } catch (error) {
      throw new PatchError(pthPath, 'could not be written', error);
    }
    return { path: pthPath, outcome: 'patched' };
  }

  /** First commented directive uncommented, or null when there is none */
  static patchContents(contents: string): string | null {
    const index = contents.indexOf(COMMENTED_DIRECTIVE);
    if (index === -1) {
      return null;
    }
    return (
      contents.slice(0, index) +
      ACTIVE_DIRECTIVE +
      contents.slice(index + COMMENTED_DIRECTIVE.length)
    );
  }
}
