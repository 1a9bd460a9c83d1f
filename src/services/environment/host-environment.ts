// Host Environment - the only place checks learn about the machine they run on

import { existsSync } from 'fs';
import * as path from 'path';

/**
 * Read-only view of the host
 */
export interface HostEnvironment {
  /** Working directory the required artifacts are resolved against */
  cwd: string;
  /** Host runtime version string, e.g. "20.11.1" */
  runtimeVersion(): string;
  /** Effective user id, undefined on platforms without uids */
  effectiveUid(): number | undefined;
  /** Existence test for a path relative to `cwd` (absolute paths pass through) */
  fileExists(relativePath: string): boolean;
  /** Absolute path for a path relative to `cwd` */
  resolve(relativePath: string): string;
}

/**
 * Environment backed by the running Node.js process
 */
export function createNodeEnvironment(cwd: string = process.cwd()): HostEnvironment {
  const resolve = (relativePath: string): string => path.resolve(cwd, relativePath);

  return {
    cwd,
    runtimeVersion: () => process.versions.node,
    effectiveUid: () => (typeof process.geteuid === 'function' ? process.geteuid() : undefined),
    fileExists: (relativePath: string) => existsSync(resolve(relativePath)),
    resolve
  };
}
