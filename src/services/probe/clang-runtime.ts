// Clang Probe Runtime - compiles the probe with clang and reads its tables from the object's symbol table

import { execa } from 'execa';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ProbeCompileError, ProbeRuntimeError, describeError, summarizeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ProbeHandle, ProbeLoadRequest, ProbeRuntime } from './probe-runtime.js';

export const CLANG_RUNTIME_SPECIFIER = 'builtin:clang';

export const CLANG_REMEDIATION = 'Install with: sudo apt-get install clang llvm';

/**
 * Runs an external command, rejecting when it exits non-zero
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<{ stdout: string; stderr: string }>;

export const execaRunner: CommandRunner = async (file, args) => {
  const res = await execa(file, [...args], { stdio: 'pipe' });
  return { stdout: res.stdout, stderr: res.stderr };
};

/**
 * Clang/LLVM tool names, overridable for versioned installs (clang-17 etc.)
 */
export interface ClangToolchain {
  clang: string;
  objdump: string;
}

const DEFAULT_TOOLCHAIN: ClangToolchain = {
  clang: 'clang',
  objdump: 'llvm-objdump'
};

// `llvm-objdump --syms` rows look like:
// 0000000000000000 g     O .maps	0000000000000020 events
const MAP_SYMBOL_PATTERN = /\s(?:\.maps|maps)\s+[0-9a-fA-F]+\s+(\S+)\s*$/;

/**
 * Names of the symbols placed in a BTF (`.maps`) or legacy (`maps`) map section
 */
export function parseMapSymbols(objdumpOutput: string): Set<string> {
  const names = new Set<string>();
  for (const line of objdumpOutput.split('\n')) {
    const match = MAP_SYMBOL_PATTERN.exec(line);
    if (match) {
      names.add(match[1]);
    }
  }
  return names;
}

function commandStderr(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr;
  }
  return undefined;
}

/**
 * First compiler diagnostic flagged as an error, if any
 */
export function firstCompilerError(stderr: string | undefined): string | undefined {
  if (!stderr) {
    return undefined;
  }
  return stderr
    .split('\n')
    .map(line => line.trim())
    .find(line => line.includes('error:'));
}

class ClangProbeHandle implements ProbeHandle {
  constructor(private readonly tables: Set<string>, private readonly workDir: string) {}

  has(tableName: string): boolean {
    return this.tables.has(tableName);
  }

  async close(): Promise<void> {
    await fs.rm(this.workDir, { recursive: true, force: true });
  }
}

/**
 * Compiles with plain `clang -target bpf`, so the probe source must be
 * libbpf-style (maps declared in a `.maps` section); BCC macros such as
 * BPF_HASH or BPF_PERF_OUTPUT do not compile here.
 */
export class ClangProbeRuntime implements ProbeRuntime {
  constructor(
    readonly description: string,
    private readonly toolchain: ClangToolchain = DEFAULT_TOOLCHAIN,
    private readonly run: CommandRunner = execaRunner
  ) {}

  /**
   * Confirm both tools run and build a runtime around them
   */
  static async detect(
    toolchain: ClangToolchain = DEFAULT_TOOLCHAIN,
    run: CommandRunner = execaRunner
  ): Promise<ClangProbeRuntime> {
    let versionLine: string;
    try {
      const clang = await run(toolchain.clang, ['--version']);
      versionLine = clang.stdout.split('\n')[0]?.trim() || toolchain.clang;
    } catch (error) {
      logger.debug('Compiler check failed', { tool: toolchain.clang, error: describeError(error) });
      throw new ProbeRuntimeError(`${toolchain.clang} is not available (${summarizeError(error)})`, CLANG_REMEDIATION);
    }

    try {
      await run(toolchain.objdump, ['--version']);
    } catch (error) {
      logger.debug('Object dump check failed', { tool: toolchain.objdump, error: describeError(error) });
      throw new ProbeRuntimeError(`${toolchain.objdump} is not available (${summarizeError(error)})`, CLANG_REMEDIATION);
    }

    return new ClangProbeRuntime(versionLine, toolchain, run);
  }

  async load(request: ProbeLoadRequest): Promise<ProbeHandle> {
    // Build output stays outside the working directory
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'probe-preflight-'));
    const objectFile = path.join(workDir, 'probe.o');

    try {
      const args = ['-O2', '-g', '-target', 'bpf', ...request.cflags, '-c', request.srcFile, '-o', objectFile];
      logger.debug('Compiling probe', { compiler: this.toolchain.clang, args });

      try {
        await this.run(this.toolchain.clang, args);
      } catch (error) {
        const stderr = commandStderr(error);
        throw new ProbeCompileError(firstCompilerError(stderr) ?? summarizeError(error), stderr);
      }

      let symbols: string;
      try {
        symbols = (await this.run(this.toolchain.objdump, ['--syms', objectFile])).stdout;
      } catch (error) {
        throw new ProbeCompileError(`Cannot read probe symbol table: ${summarizeError(error)}`, commandStderr(error));
      }

      const tables = parseMapSymbols(symbols);
      logger.debug('Probe tables', { tables: [...tables] });
      return new ClangProbeHandle(tables, workDir);
    } catch (error) {
      await fs.rm(workDir, { recursive: true, force: true });
      throw error;
    }
  }
}
