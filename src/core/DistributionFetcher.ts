import AdmZip from 'adm-zip';
import { Architecture, VersionTriple } from '../types/Dist';
import { ExtractionError } from '../utils/Errors';
import { FileSystem } from '../utils/FileSystem';
import { HttpClient } from '../utils/HttpClient';
import { logger } from '../utils/Logger';
import { VersionResolver } from './VersionResolver';

export const DEFAULT_DISTRIBUTION_BASE_URL = 'https://www.python.org/ftp/python';

export interface FetchOptions {
  architecture: Architecture;
  baseUrl?: string;
  timeout?: number;
  signal?: AbortSignal;
}

export class DistributionFetcher {
  static archiveUrl(
    version: VersionTriple,
    architecture: Architecture,
    baseUrl: string = DEFAULT_DISTRIBUTION_BASE_URL
  ): string {
    const v = VersionResolver.format(version);
    return `${baseUrl.replace(/\/+$/, '')}/${v}/python-${v}-embed-${architecture}.zip`;
  }

  /**
   * Download the embeddable zip and unpack all of it into targetDir.
   * A failed extraction may leave files behind; delete the directory and retry.
   */
  static async fetchAndExtract(
    version: VersionTriple,
    targetDir: string,
    options: FetchOptions
  ): Promise<string> {
    const url = this.archiveUrl(version, options.architecture, options.baseUrl);
    const archive = await HttpClient.download(url, {
      ...(options.timeout !== undefined && { timeout: options.timeout }),
      ...(options.signal && { signal: options.signal }),
    });

    this.extract(archive, targetDir);
    return url;
  }

  static extract(archive: Buffer, targetDir: string): void {
    try {
      const zip = new AdmZip(archive);
      const entries = zip.getEntries();
      zip.extractAllTo(targetDir, true);
      logger.debug(`Extracted ${entries.length} entries into ${targetDir}`);
    } catch (error) {
      throw new ExtractionError(targetDir, error);
    }
  }

  static async prepareTarget(targetDir: string): Promise<void> {
    try {
      await FileSystem.ensureDirExists(targetDir);
    } catch (error) {
      throw new ExtractionError(targetDir, error);
    }
  }
}
