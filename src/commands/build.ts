import { Command, Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { ConfigManager } from '../core/ConfigManager';
import { DistributionBuilder } from '../core/DistributionBuilder';
import { VersionResolver } from '../core/VersionResolver';
import { EmbedpyConfig } from '../types/Config';
import { ARCHITECTURES, BuildResult } from '../types/Dist';
import { EmbedpyError } from '../utils/Errors';
import { logger } from '../utils/Logger';
import { LoggerReporter, ProgressReporter, SpinnerReporter } from '../utils/ProgressReporter';

export default class Build extends Command {
  static override description =
    'Assemble an embedded Python distribution, bootstrap pip into it and optionally install requirements';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> dist/python --py-version 3.9.7',
    '<%= config.bin %> <%= command.id %> dist/python -p 3.11.4 -r requirements.txt',
    '<%= config.bin %> <%= command.id %> --arch win32 --download-timeout 60000',
  ];

  static override args = {
    output: Args.string({
      description: 'Output directory for the distribution (defaults to pydist)',
    }),
  };

  static override flags = {
    'py-version': Flags.string({
      char: 'p',
      description: 'Python version as X.Y.Z (detected from the host python when omitted)',
    }),
    requirements: Flags.string({
      char: 'r',
      description: 'Requirements file to install with the new pip',
    }),
    arch: Flags.string({
      description: 'Embeddable archive architecture',
      options: [...ARCHITECTURES],
    }),
    'download-timeout': Flags.integer({
      description: 'Milliseconds to wait for each download (0 waits indefinitely)',
      min: 0,
    }),
    'process-timeout': Flags.integer({
      description: 'Milliseconds to wait for python and pip (0 waits indefinitely)',
      min: 0,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: 'Show debug output',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Build);

    const config = await this.resolveConfig(flags);
    logger.setLevel(flags.verbose ? 'debug' : config.logLevel);

    const reporter: ProgressReporter = process.stderr.isTTY
      ? new SpinnerReporter()
      : new LoggerReporter();
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupted; the output directory may be left partially assembled');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const builder = new DistributionBuilder({ config, reporter });
      const result = await builder.build({
        targetDir: args.output ?? config.defaultOutputDir,
        signal: controller.signal,
        ...(flags['py-version'] !== undefined && { version: flags['py-version'] }),
        ...(flags.requirements !== undefined && { requirements: flags.requirements }),
      });

      this.showSummary(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error occurred';
      reporter.fail(message);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
      this.error(error instanceof EmbedpyError ? `[${error.code}] ${message}` : message, { exit: 1 });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  }

  private async resolveConfig(flags: {
    arch: string | undefined;
    'download-timeout': number | undefined;
    'process-timeout': number | undefined;
  }): Promise<EmbedpyConfig> {
    const config = { ...(await ConfigManager.getInstance().loadConfig()) };

    if (flags.arch !== undefined) {
      const arch = ARCHITECTURES.find(candidate => candidate === flags.arch);
      if (arch === undefined) {
        this.error(`Unsupported architecture: ${flags.arch}`);
      }
      config.architecture = arch;
    }
    if (flags['download-timeout'] !== undefined) {
      config.downloadTimeout = flags['download-timeout'];
    }
    if (flags['process-timeout'] !== undefined) {
      config.processTimeout = flags['process-timeout'];
    }

    return config;
  }

  private showSummary(result: BuildResult): void {
    this.log(chalk.green(`✅ Python ${VersionResolver.format(result.version)} at ${result.targetDir}`));

    if (result.reused) {
      this.log(chalk.gray('   Existing distribution reused (pip already installed)'));
    }
    if (result.merge) {
      this.log(
        chalk.gray(
          `   libs: ${result.merge.copied.length} copied, ${result.merge.skipped.length} already present`
        )
      );
    }
    if (result.requirementsInstalled) {
      this.log(chalk.gray('   Requirements installed'));
    }
  }
}
