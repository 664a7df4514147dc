import * as fs from 'fs-extra';
import * as yaml from 'yaml';
import { ARCHITECTURES, Architecture, BuildManifest, VersionTriple } from '../types/Dist';
import { ManifestError, describeCause } from '../utils/Errors';
import { DistLayout } from './DistLayout';
import { VersionResolver } from './VersionResolver';

/**
 * embedpy.yml records what an assembled directory was built from,
 * so a later run for another version is not satisfied by the marker alone.
 */
export class BuildManifestStore {
  static async read(targetDir: string): Promise<BuildManifest | null> {
    const manifestPath = new DistLayout(targetDir).manifest;
    if (!(await fs.pathExists(manifestPath))) {
      return null;
    }

    try {
      const content = await fs.readFile(manifestPath, 'utf8');
      const parsed: unknown = yaml.parse(content);
      return toManifest(parsed);
    } catch (error) {
      throw new ManifestError(manifestPath, describeCause(error), error);
    }
  }

  static async write(
    targetDir: string,
    version: VersionTriple,
    architecture: Architecture
  ): Promise<BuildManifest> {
    const manifest: BuildManifest = {
      pythonVersion: VersionResolver.format(version),
      architecture,
      createdAt: new Date().toISOString(),
    };

    await fs.writeFile(new DistLayout(targetDir).manifest, yaml.stringify(manifest), 'utf8');
    return manifest;
  }
}

function toManifest(value: unknown): BuildManifest {
  if (typeof value !== 'object' || value === null) {
    throw new Error('not a mapping');
  }

  const pythonVersion: unknown = Reflect.get(value, 'pythonVersion');
  const architecture: unknown = Reflect.get(value, 'architecture');
  const createdAt: unknown = Reflect.get(value, 'createdAt');

  if (typeof pythonVersion !== 'string') {
    throw new Error("'pythonVersion' is missing");
  }
  // Rejects a malformed recorded version
  VersionResolver.parse(pythonVersion);
  const arch = ARCHITECTURES.find(candidate => candidate === architecture);
  if (arch === undefined) {
    throw new Error(`'architecture' must be one of ${ARCHITECTURES.join(', ')}`);
  }

  return {
    pythonVersion,
    architecture: arch,
    createdAt: typeof createdAt === 'string' ? createdAt : '',
  };
}
