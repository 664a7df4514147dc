import { VersionTriple } from '../types/Dist';
import { InvalidFormatError } from '../utils/Errors';
import { runTool } from './ToolRunner';

const MAX_COMPONENT = 65535;

const VERSION_PROBE = "import sys; print('.'.join(str(part) for part in sys.version_info[:3]))";

export interface HostProbeOptions {
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  signal?: AbortSignal;
}

export class VersionResolver {
  /**
   * Parse an `X.Y.Z` string. Exactly three integer components, each at most 65535.
   */
  static parse(input: string): VersionTriple {
    const parts = input.trim().split('.');
    if (parts.length !== 3 || parts.some(part => !/^\d+$/.test(part))) {
      throw new InvalidFormatError(input);
    }

    const [major, minor, patch] = parts.map(part => parseInt(part, 10));
    if (
      major === undefined ||
      minor === undefined ||
      patch === undefined ||
      [major, minor, patch].some(component => component > MAX_COMPONENT)
    ) {
      throw new InvalidFormatError(input);
    }

    return { major, minor, patch };
  }

  static format(version: VersionTriple): string {
    return `${version.major}.${version.minor}.${version.patch}`;
  }

  /**
   * Ask a host interpreter for its own version.
   */
  static async detectHostVersion(
    hostPython: string,
    options: HostProbeOptions = {}
  ): Promise<VersionTriple> {
    const result = await runTool(hostPython, ['-c', VERSION_PROBE], options);
    return this.parse(result.stdout);
  }

  static async resolve(
    explicit: string | undefined,
    hostPython: string,
    options: HostProbeOptions = {}
  ): Promise<VersionTriple> {
    if (explicit !== undefined) {
      return this.parse(explicit);
    }
    return this.detectHostVersion(hostPython, options);
  }

  static equals(a: VersionTriple, b: VersionTriple): boolean {
    return a.major === b.major && a.minor === b.minor && a.patch === b.patch;
  }
}
