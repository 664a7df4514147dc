import { Command, Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import * as path from 'path';
import { BuildManifestStore } from '../core/BuildManifestStore';
import { ConfigManager } from '../core/ConfigManager';
import { DistLayout } from '../core/DistLayout';
import { DistributionFetcher } from '../core/DistributionFetcher';
import { HostLibraryLocator } from '../core/HostLibraryLocator';
import { InstallerBootstrapper } from '../core/InstallerBootstrapper';
import { VersionResolver } from '../core/VersionResolver';
import { VersionTriple } from '../types/Dist';
import { FileSystem } from '../utils/FileSystem';

export default class Info extends Command {
  static override description = 'Show the state of an output directory and the effective settings';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> dist/python --py-version 3.10.11',
  ];

  static override args = {
    output: Args.string({
      description: 'Output directory to inspect (defaults to pydist)',
    }),
  };

  static override flags = {
    'py-version': Flags.string({
      char: 'p',
      description: 'Also show the archive URL and host libs lookup for this X.Y.Z version',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Info);

    try {
      const configManager = ConfigManager.getInstance();
      const config = await configManager.loadConfig();
      const targetDir = path.resolve(args.output ?? config.defaultOutputDir);
      const layout = new DistLayout(targetDir);

      this.log(chalk.blue(`📁 ${targetDir}`));
      if (!(await FileSystem.pathExists(targetDir))) {
        this.log(chalk.gray('   Not created yet'));
      } else if (await InstallerBootstrapper.isBootstrapped(targetDir)) {
        this.log(chalk.green(`   Assembled (${layout.marker} present)`));
        const manifest = await BuildManifestStore.read(targetDir);
        if (manifest) {
          this.log(chalk.gray(`   Python ${manifest.pythonVersion} (${manifest.architecture})`));
          this.log(chalk.gray(`   Built ${manifest.createdAt || 'at an unknown time'}`));
        } else {
          this.log(chalk.yellow('   No build manifest recorded'));
        }
      } else {
        this.log(chalk.yellow('   Partially assembled: pip is missing, remove the directory and rebuild'));
      }

      this.log(chalk.blue(`\n⚙️  Settings (${configManager.getConfigPath()})`));
      for (const [key, value] of Object.entries(config)) {
        this.log(chalk.gray(`   ${key}: ${chalk.white(String(value))}`));
      }

      if (flags['py-version'] !== undefined) {
        const version = VersionResolver.parse(flags['py-version']);
        this.log(chalk.blue(`\n🐍 Python ${VersionResolver.format(version)}`));
        this.log(
          chalk.gray(
            `   Archive: ${DistributionFetcher.archiveUrl(version, config.architecture, config.distributionBaseUrl)}`
          )
        );
        this.log(chalk.gray(`   Host libs: ${await this.describeHostLibs(version)}`));
      }
    } catch (error) {
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }

  private async describeHostLibs(version: VersionTriple): Promise<string> {
    try {
      return await HostLibraryLocator.locate(version);
    } catch (error) {
      return chalk.yellow(error instanceof Error ? error.message : 'Unknown error');
    }
  }
}
