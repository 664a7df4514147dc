import * as path from 'path';
import { MergeSummary } from '../types/Dist';
import { CopyError } from '../utils/Errors';
import { FileSystem } from '../utils/FileSystem';
import { logger } from '../utils/Logger';

export class LibraryMerger {
  /**
   * Copy each immediate child of `source` into `destination`.
   * Children are copied whole; anything already at the destination is kept as it is.
   */
  static async merge(source: string, destination: string): Promise<MergeSummary> {
    const summary: MergeSummary = { source, destination, copied: [], skipped: [] };

    let entries: string[];
    try {
      entries = await FileSystem.listEntries(source);
      await FileSystem.ensureDirExists(destination);
    } catch (error) {
      throw new CopyError(source, error);
    }

    for (const entry of entries) {
      const from = path.join(source, entry);
      const to = path.join(destination, entry);

      if (await FileSystem.pathExists(to)) {
        logger.debug(`Keeping existing ${to}`);
        summary.skipped.push(entry);
        continue;
      }

      try {
        await FileSystem.copyWithoutOverwrite(from, to);
      } catch (error) {
        throw new CopyError(from, error);
      }
      summary.copied.push(entry);
    }

    logger.debug(
      `Merged ${source} into ${destination}: ${summary.copied.length} copied, ${summary.skipped.length} kept`
    );
    return summary;
  }
}
