import * as fs from 'fs-extra';
import * as path from 'path';
import { ConfigManager } from '../../src/core/ConfigManager';
import { DistributionBuilder } from '../../src/core/DistributionBuilder';
import { BuildManifestStore } from '../../src/core/BuildManifestStore';
import { HttpClient } from '../../src/utils/HttpClient';
import { ProcessUtils, ProcessOptions } from '../../src/utils/ProcessUtils';
import {
  InvalidFormatError,
  NotFoundError,
  ToolExecutionError,
  VersionMismatchError,
} from '../../src/utils/Errors';
import { ProgressReporter } from '../../src/utils/ProgressReporter';
import { BuildPhase } from '../../src/types/Dist';
import { createTempDir, cleanupTempDir, createEmbedArchive, createHostInstall } from '../setup';

jest.mock('../../src/utils/HttpClient', () => ({
  HttpClient: {
    download: jest.fn(),
  },
}));

jest.mock('../../src/utils/ProcessUtils', () => ({
  ProcessUtils: {
    execute: jest.fn(),
    formatCommand: (command: string, args: string[]) => [command, ...args].join(' '),
  },
}));

const download = jest.mocked(HttpClient.download);
const execute = jest.mocked(ProcessUtils.execute);

class RecordingReporter implements ProgressReporter {
  readonly phases: BuildPhase[] = [];
  readonly failures: string[] = [];

  phase(phase: BuildPhase): void {
    this.phases.push(phase);
  }

  pause(): void {}

  fail(message: string): void {
    this.failures.push(message);
  }
}

/**
 * Stand-in for python.exe and pip.exe: running get-pip leaves Scripts/pip.exe behind,
 * pip fails on a requirements file that does not exist.
 */
async function fakeTools(command: string, args: string[] = [], options: ProcessOptions = {}) {
  if (command.endsWith('python.exe')) {
    await fs.outputFile(path.join(options.cwd ?? '', 'Scripts', 'pip.exe'), 'fake pip');
    return { stdout: 'Successfully installed pip-24.0', stderr: '', exitCode: 0 };
  }
  if (command.endsWith('pip.exe')) {
    const manifest = args[2] ?? '';
    if (!(await fs.pathExists(manifest))) {
      return {
        stdout: '',
        stderr: `ERROR: Could not open requirements file: ${manifest}`,
        exitCode: 1,
      };
    }
    return { stdout: 'Successfully installed', stderr: '', exitCode: 0 };
  }
  if (command === 'python') {
    return { stdout: '3.9.7\n', stderr: '', exitCode: 0 };
  }
  throw new Error(`Process execution failed: spawn ${command} ENOENT`);
}

describe('Build Workflow Integration', () => {
  let tempDir: string;
  let targetDir: string;
  let hostInstall: string;
  let env: NodeJS.ProcessEnv;
  let reporter: RecordingReporter;
  let builder: DistributionBuilder;

  beforeEach(async () => {
    tempDir = await createTempDir();
    targetDir = path.join(tempDir, 'out', 'pydist');
    hostInstall = await createHostInstall(path.join(tempDir, 'host'), 'Python39', {
      'python39.lib': 'HOST',
      'python3.lib': 'HOST',
    });
    env = {
      PATH: [path.join(tempDir, 'host', 'Python39', 'Scripts'), hostInstall].join(path.delimiter),
      HOME: '/home/test',
    };

    download.mockImplementation(async url =>
      url.endsWith('.zip')
        ? createEmbedArchive(3, 9, { 'libs/python3.lib': 'ARCHIVE' })
        : Buffer.from('# get-pip placeholder\n')
    );
    execute.mockImplementation(fakeTools);

    reporter = new RecordingReporter();
    builder = new DistributionBuilder({
      config: ConfigManager.createDefaultConfig(),
      reporter,
      env,
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
    jest.clearAllMocks();
  });

  describe('Fresh Assembly', () => {
    it('should assemble a complete distribution', async () => {
      const result = await builder.build({ targetDir, version: '3.9.7' });

      expect(result.reused).toBe(false);
      expect(result.requirementsInstalled).toBe(false);
      expect(result.targetDir).toBe(targetDir);
      expect(await fs.pathExists(path.join(targetDir, 'python.exe'))).toBe(true);
      expect(await fs.pathExists(path.join(targetDir, 'Scripts', 'pip.exe'))).toBe(true);

      const pth = await fs.readFile(path.join(targetDir, 'python39._pth'), 'utf8');
      expect(pth).toBe('python39.zip\n.\n\n# Uncomment to run site.main() automatically\nimport site\n');
    });

    it('should download the archive for the version and then get-pip', async () => {
      await builder.build({ targetDir, version: '3.9.7' });

      expect(download.mock.calls.map(call => call[0])).toEqual([
        'https://www.python.org/ftp/python/3.9.7/python-3.9.7-embed-amd64.zip',
        'https://bootstrap.pypa.io/get-pip.py',
      ]);
    });

    it('should merge host libs without replacing what the archive ships', async () => {
      const result = await builder.build({ targetDir, version: '3.9.7' });

      expect(await fs.readFile(path.join(targetDir, 'libs', 'python3.lib'), 'utf8')).toBe('ARCHIVE');
      expect(await fs.readFile(path.join(targetDir, 'libs', 'python39.lib'), 'utf8')).toBe('HOST');
      expect(result.merge?.copied).toEqual(['python39.lib']);
      expect(result.merge?.skipped).toEqual(['python3.lib']);
    });

    it('should run get-pip under the PATH override only', async () => {
      const before = { ...process.env };

      await builder.build({ targetDir, version: '3.9.7' });

      const [command, , options] = execute.mock.calls[0] ?? [];
      expect(command).toBe(path.join(targetDir, 'python.exe'));
      expect(options?.env?.PATH).toBe(
        `${targetDir}${path.delimiter}${path.join(targetDir, 'Scripts')}`
      );
      expect(options?.env?.HOME).toBe('/home/test');
      expect(process.env).toEqual(before);
    });

    it('should report each phase in order', async () => {
      await builder.build({ targetDir, version: '3.9.7' });

      expect(reporter.phases).toEqual(['download', 'copy', 'patch', 'bootstrap', 'done']);
    });

    it('should record the build and drop the bootstrap script', async () => {
      await builder.build({ targetDir, version: '3.9.7' });

      const manifest = await BuildManifestStore.read(targetDir);
      expect(manifest?.pythonVersion).toBe('3.9.7');
      expect(manifest?.architecture).toBe('amd64');
      expect(await fs.pathExists(path.join(targetDir, 'get-pip.py'))).toBe(false);
    });

    it('should detect the version from the host interpreter when none is given', async () => {
      const result = await builder.build({ targetDir });

      expect(result.version).toEqual({ major: 3, minor: 9, patch: 7 });
      expect(execute.mock.calls[0]?.[0]).toBe('python');
    });

    it('should install requirements after the bootstrap', async () => {
      const manifest = path.join(tempDir, 'requirements.txt');
      await fs.writeFile(manifest, 'requests\n');

      const result = await builder.build({ targetDir, version: '3.9.7', requirements: manifest });

      expect(result.requirementsInstalled).toBe(true);
      expect(execute.mock.calls.map(call => call[0])).toEqual([
        path.join(targetDir, 'python.exe'),
        path.join(targetDir, 'Scripts', 'pip.exe'),
      ]);
      expect(reporter.phases).toEqual(['download', 'copy', 'patch', 'bootstrap', 'requirements', 'done']);
    });
  });

  describe('Failures', () => {
    it('should stop before any download when Python39 is not on PATH', async () => {
      builder = new DistributionBuilder({
        config: ConfigManager.createDefaultConfig(),
        reporter,
        env: { PATH: path.join(tempDir, 'elsewhere') },
      });

      await expect(builder.build({ targetDir, version: '3.9.7' })).rejects.toThrow(
        'Could not find any Python39/libs in PATH'
      );
      await expect(builder.build({ targetDir, version: '3.9.7' })).rejects.toBeInstanceOf(NotFoundError);
      expect(download).not.toHaveBeenCalled();
      expect(await fs.pathExists(targetDir)).toBe(false);
    });

    it('should reject a malformed version without touching disk or network', async () => {
      await expect(builder.build({ targetDir, version: '3.9' })).rejects.toBeInstanceOf(InvalidFormatError);
      expect(download).not.toHaveBeenCalled();
      expect(execute).not.toHaveBeenCalled();
      expect(await fs.pathExists(targetDir)).toBe(false);
    });

    it('should surface a missing requirements file as a pip failure', async () => {
      const missing = path.join(tempDir, 'does-not-exist.txt');

      const failure = builder.build({ targetDir, version: '3.9.7', requirements: missing });

      await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
      await expect(failure).rejects.toMatchObject({
        exitCode: 1,
        stderr: `ERROR: Could not open requirements file: ${missing}`,
      });
    });

    it('should leave the target as it is when get-pip fails', async () => {
      execute.mockImplementation(async () => ({ stdout: '', stderr: 'network down', exitCode: 1 }));

      await expect(builder.build({ targetDir, version: '3.9.7' })).rejects.toBeInstanceOf(ToolExecutionError);
      expect(await fs.pathExists(path.join(targetDir, 'python.exe'))).toBe(true);
      expect(await BuildManifestStore.read(targetDir)).toBeNull();
    });
  });

  describe('Re-running', () => {
    it('should reuse an assembled directory without network or extraction', async () => {
      await builder.build({ targetDir, version: '3.9.7' });
      download.mockClear();
      execute.mockClear();
      await fs.remove(path.join(targetDir, 'python39.dll'));

      const result = await builder.build({ targetDir, version: '3.9.7' });

      expect(result.reused).toBe(true);
      expect(result.merge).toBeUndefined();
      expect(download).not.toHaveBeenCalled();
      expect(execute).not.toHaveBeenCalled();
      expect(await fs.pathExists(path.join(targetDir, 'python39.dll'))).toBe(false);
    });

    it('should go straight to requirements on a reused directory', async () => {
      await builder.build({ targetDir, version: '3.9.7' });
      execute.mockClear();
      const manifest = path.join(tempDir, 'requirements.txt');
      await fs.writeFile(manifest, 'requests\n');

      const result = await builder.build({ targetDir, version: '3.9.7', requirements: manifest });

      expect(result.requirementsInstalled).toBe(true);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute.mock.calls[0]?.[0]).toBe(path.join(targetDir, 'Scripts', 'pip.exe'));
    });

    it('should refuse to reuse a directory built for another version', async () => {
      await builder.build({ targetDir, version: '3.9.7' });

      await expect(builder.build({ targetDir, version: '3.9.8' })).rejects.toBeInstanceOf(
        VersionMismatchError
      );
    });

    it('should compare versions numerically when reusing', async () => {
      await builder.build({ targetDir, version: '3.9.7' });
      download.mockClear();

      const result = await builder.build({ targetDir, version: '3.09.07' });

      expect(result.reused).toBe(true);
      expect(download).not.toHaveBeenCalled();
    });

    it('should report a corrupt manifest with its error code', async () => {
      await builder.build({ targetDir, version: '3.9.7' });
      await fs.writeFile(path.join(targetDir, 'embedpy.yml'), 'just a string\n');

      await expect(builder.build({ targetDir, version: '3.9.7' })).rejects.toMatchObject({
        code: 'MANIFEST_INVALID',
      });
    });

    it('should reuse a directory with pip but no manifest', async () => {
      await fs.outputFile(path.join(targetDir, 'Scripts', 'pip.exe'), 'fake pip');

      const result = await builder.build({ targetDir, version: '3.10.4' });

      expect(result.reused).toBe(true);
      expect(download).not.toHaveBeenCalled();
    });
  });
});
