// src/types/Dist.ts - Embedded distribution types
export interface VersionTriple {
  major: number;
  minor: number;
  patch: number;
}

export type Architecture = 'amd64' | 'win32' | 'arm64';

export const ARCHITECTURES: readonly Architecture[] = ['amd64', 'win32', 'arm64'];

export type BuildPhase = 'download' | 'copy' | 'patch' | 'bootstrap' | 'requirements' | 'done';

export interface BuildOptions {
  targetDir: string;
  /** Explicit X.Y.Z version; the host interpreter is probed when omitted */
  version?: string;
  /** Requirements file handed to pip after the bootstrap */
  requirements?: string;
  signal?: AbortSignal;
}

export interface MergeSummary {
  source: string;
  destination: string;
  copied: string[];
  skipped: string[];
}

export interface BuildResult {
  version: VersionTriple;
  targetDir: string;
  /** True when the marker executable was found and assembly did not run */
  reused: boolean;
  merge?: MergeSummary;
  requirementsInstalled: boolean;
}

/** Contents of embedpy.yml, written once pip is bootstrapped */
export interface BuildManifest {
  pythonVersion: string;
  architecture: Architecture;
  createdAt: string;
}
