// Probe Runtime Loader - turns a runtime specifier into a usable ProbeRuntime

import * as path from 'path';
import { pathToFileURL } from 'url';
import { ProbeRuntimeError, summarizeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ProbeRuntimeModuleSchema, ProbeRuntimeSchema, formatIssues } from '../../core/schemas.js';
import { CLANG_RUNTIME_SPECIFIER, ClangProbeRuntime } from './clang-runtime.js';
import { ProbeRuntime } from './probe-runtime.js';

export const BUILTIN_PREFIX = 'builtin:';

/**
 * Resolves a runtime or rejects with ProbeRuntimeError
 */
export interface ProbeRuntimeLoader {
  resolve(specifier: string): Promise<ProbeRuntime>;
}

export interface ModuleLoaderOptions {
  /** Directory relative module paths are resolved against */
  cwd: string;
  importModule?: (specifier: string) => Promise<unknown>;
  builtins?: Record<string, () => Promise<ProbeRuntime>>;
}

const defaultBuiltins: Record<string, () => Promise<ProbeRuntime>> = {
  [CLANG_RUNTIME_SPECIFIER]: () => ClangProbeRuntime.detect()
};

function isPathSpecifier(specifier: string): boolean {
  return specifier.startsWith('.') || path.isAbsolute(specifier);
}

/**
 * `builtin:*` specifiers map to bundled runtimes; anything else is a module
 * exporting createProbeRuntime().
 */
export class ModuleProbeRuntimeLoader implements ProbeRuntimeLoader {
  private readonly importModule: (specifier: string) => Promise<unknown>;
  private readonly builtins: Record<string, () => Promise<ProbeRuntime>>;

  constructor(private readonly options: ModuleLoaderOptions) {
    this.importModule = options.importModule ?? (specifier => import(specifier));
    this.builtins = options.builtins ?? defaultBuiltins;
  }

  async resolve(specifier: string): Promise<ProbeRuntime> {
    if (specifier.startsWith(BUILTIN_PREFIX)) {
      const create = this.builtins[specifier];
      if (!create) {
        throw new ProbeRuntimeError(
          `Unknown builtin runtime "${specifier}"`,
          `Use one of: ${Object.keys(this.builtins).join(', ')}`
        );
      }
      return create();
    }

    const target = isPathSpecifier(specifier)
      ? pathToFileURL(path.resolve(this.options.cwd, specifier)).href
      : specifier;
    const remediation = `Install the module providing "${specifier}" or change runtime.module in .preflight/config.yaml`;

    let namespace: unknown;
    try {
      logger.debug('Importing probe runtime module', { specifier, target });
      namespace = await this.importModule(target);
    } catch (error) {
      throw new ProbeRuntimeError(`Cannot load "${specifier}": ${summarizeError(error)}`, remediation);
    }

    const moduleResult = ProbeRuntimeModuleSchema.safeParse(namespace);
    if (!moduleResult.success) {
      throw new ProbeRuntimeError(`Invalid runtime module "${specifier}": ${formatIssues(moduleResult.error)}`, remediation);
    }

    let created: unknown;
    try {
      created = await moduleResult.data.createProbeRuntime();
    } catch (error) {
      throw new ProbeRuntimeError(`"${specifier}" failed to initialize: ${summarizeError(error)}`, remediation);
    }

    const runtimeResult = ProbeRuntimeSchema.safeParse(created);
    if (!runtimeResult.success) {
      throw new ProbeRuntimeError(`Invalid runtime from "${specifier}": ${formatIssues(runtimeResult.error)}`, remediation);
    }
    return runtimeResult.data;
  }
}
