import * as path from 'path';
import { VersionTriple } from '../types/Dist';

/**
 * Fixed locations inside an assembled embedded distribution.
 */
export class DistLayout {
  static readonly SCRIPTS_DIR = 'Scripts';
  static readonly LIBS_DIR = 'libs';
  static readonly INTERPRETER = 'python.exe';
  static readonly PIP = 'pip.exe';
  static readonly BOOTSTRAP_SCRIPT = 'get-pip.py';
  static readonly MANIFEST = 'embedpy.yml';

  constructor(readonly root: string) {}

  get scriptsDir(): string {
    return path.join(this.root, DistLayout.SCRIPTS_DIR);
  }

  get libsDir(): string {
    return path.join(this.root, DistLayout.LIBS_DIR);
  }

  get interpreter(): string {
    return path.join(this.root, DistLayout.INTERPRETER);
  }

  /** Presence of pip means a previous run finished assembling */
  get marker(): string {
    return path.join(this.scriptsDir, DistLayout.PIP);
  }

  get bootstrapScript(): string {
    return path.join(this.root, DistLayout.BOOTSTRAP_SCRIPT);
  }

  get manifest(): string {
    return path.join(this.root, DistLayout.MANIFEST);
  }

  pthFile(version: VersionTriple): string {
    return path.join(this.root, DistLayout.pthFileName(version));
  }

  static pthFileName(version: VersionTriple): string {
    return `python${version.major}${version.minor}._pth`;
  }
}
