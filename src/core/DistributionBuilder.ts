import * as path from 'path';
import { EmbedpyConfig } from '../types/Config';
import { BuildOptions, BuildResult, MergeSummary, VersionTriple } from '../types/Dist';
import { VersionMismatchError } from '../utils/Errors';
import { logger } from '../utils/Logger';
import { LoggerReporter, ProgressReporter } from '../utils/ProgressReporter';
import { BuildManifestStore } from './BuildManifestStore';
import { DistLayout } from './DistLayout';
import { DistributionFetcher } from './DistributionFetcher';
import { HostLibraryLocator } from './HostLibraryLocator';
import { ImportSitePatcher } from './ImportSitePatcher';
import { InstallerBootstrapper } from './InstallerBootstrapper';
import { LibraryMerger } from './LibraryMerger';
import { RequirementsInstaller } from './RequirementsInstaller';
import { VersionResolver } from './VersionResolver';

export interface DistributionBuilderOptions {
  config: EmbedpyConfig;
  reporter?: ProgressReporter;
  /** Parent environment: searched for host libraries and copied into child processes */
  env?: NodeJS.ProcessEnv;
}

/**
 * resolve → fetch → merge → patch → bootstrap → requirements.
 * Each phase works on what the previous one left on disk, so they run one at a time
 * and the first failure ends the build. Nothing is rolled back.
 */
export class DistributionBuilder {
  private readonly config: EmbedpyConfig;
  private readonly reporter: ProgressReporter;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: DistributionBuilderOptions) {
    this.config = options.config;
    this.reporter = options.reporter ?? new LoggerReporter();
    this.env = options.env ?? process.env;
  }

  async build(options: BuildOptions): Promise<BuildResult> {
    const targetDir = path.resolve(options.targetDir);
    const { signal } = options;

    const version = await VersionResolver.resolve(options.version, this.config.hostPython, {
      env: this.env,
      ...this.processTimeout(),
      ...(signal && { signal }),
    });
    const versionString = VersionResolver.format(version);
    logger.debug(`Target Python version ${versionString}`);

    let merge: MergeSummary | undefined;
    const reused = await InstallerBootstrapper.isBootstrapped(targetDir);

    if (reused) {
      await this.verifyExisting(targetDir, version);
      logger.info(`${targetDir} is already assembled, skipping to requirements`);
    } else {
      merge = await this.assemble(targetDir, version, signal);
    }

    let requirementsInstalled = false;
    if (options.requirements !== undefined) {
      this.reporter.phase('requirements', `Installing requirements from ${options.requirements}...`);
      this.reporter.pause();
      await RequirementsInstaller.install(targetDir, options.requirements, {
        baseEnv: this.env,
        ...this.processTimeout(),
        ...(signal && { signal }),
      });
      requirementsInstalled = true;
    }

    this.reporter.phase('done', `Python ${versionString} ready in ${targetDir}`);

    return {
      version,
      targetDir,
      reused,
      ...(merge && { merge }),
      requirementsInstalled,
    };
  }

  private async assemble(
    targetDir: string,
    version: VersionTriple,
    signal: AbortSignal | undefined
  ): Promise<MergeSummary> {
    const layout = new DistLayout(targetDir);

    // Before any download: a missing host install should fail fast
    const hostLibs = await HostLibraryLocator.locate(version, this.env);

    await DistributionFetcher.prepareTarget(targetDir);

    const url = DistributionFetcher.archiveUrl(
      version,
      this.config.architecture,
      this.config.distributionBaseUrl
    );
    this.reporter.phase('download', `Downloading ${url}...`);
    await DistributionFetcher.fetchAndExtract(version, targetDir, {
      architecture: this.config.architecture,
      baseUrl: this.config.distributionBaseUrl,
      ...this.downloadTimeout(),
      ...(signal && { signal }),
    });

    this.reporter.phase('copy', `Copying libs from ${hostLibs}...`);
    const merge = await LibraryMerger.merge(hostLibs, layout.libsDir);

    this.reporter.phase('patch', `Enabling import site in ${DistLayout.pthFileName(version)}...`);
    await ImportSitePatcher.enableImportSite(targetDir, version);

    this.reporter.phase('bootstrap', 'Installing pip...');
    this.reporter.pause();
    await InstallerBootstrapper.bootstrap(targetDir, {
      getPipUrl: this.config.getPipUrl,
      baseEnv: this.env,
      ...(this.config.downloadTimeout > 0 && { downloadTimeout: this.config.downloadTimeout }),
      ...(this.config.processTimeout > 0 && { processTimeout: this.config.processTimeout }),
      ...(signal && { signal }),
    });

    await BuildManifestStore.write(targetDir, version, this.config.architecture);
    return merge;
  }

  private async verifyExisting(targetDir: string, version: VersionTriple): Promise<void> {
    const manifest = await BuildManifestStore.read(targetDir);
    const requested = VersionResolver.format(version);

    if (!manifest) {
      logger.warn(`${targetDir} has pip but no build manifest; assuming it matches Python ${requested}`);
      return;
    }

    if (!VersionResolver.equals(VersionResolver.parse(manifest.pythonVersion), version)) {
      throw new VersionMismatchError(targetDir, requested, manifest.pythonVersion);
    }
  }

  private processTimeout(): { timeout?: number } {
    return this.config.processTimeout > 0 ? { timeout: this.config.processTimeout } : {};
  }

  private downloadTimeout(): { timeout?: number } {
    return this.config.downloadTimeout > 0 ? { timeout: this.config.downloadTimeout } : {};
  }
}
