// Probe Compilation Check - compile/load the probe and look for its data tables

import { ProbeCompileError, describeError, summarizeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { createOutcome, failureLine, successLine } from '../../models/outcome.js';
import { CheckOutcome, CompilationResult, MessageLine, RequiredArtifact, TablePresence } from '../../models/types.js';
import { HostEnvironment } from '../environment/host-environment.js';
import { ProbeHandle, ProbeRuntime } from '../probe/probe-runtime.js';

export const PROBE_COMPILATION_TITLE = 'Compiling probe program';
export const SKIPPED_COMPILATION_TITLE = 'Skipping probe compilation (prerequisites not met)';

export interface CompilationRequest {
  probeSource: RequiredArtifact;
  tables: readonly string[];
  cflags: readonly string[];
  env: Pick<HostEnvironment, 'fileExists' | 'resolve'>;
}

async function release(handle: ProbeHandle): Promise<void> {
  try {
    await handle.close();
  } catch (error) {
    logger.warn('Failed to release probe handle', { error: describeError(error) });
  }
}

/**
 * Load the probe and test each table. Any failure comes back as a value.
 */
export async function compileProbe(runtime: ProbeRuntime, request: CompilationRequest): Promise<CompilationResult> {
  let handle: ProbeHandle;
  try {
    handle = await runtime.load({
      srcFile: request.env.resolve(request.probeSource.path),
      cflags: request.cflags
    });
  } catch (error) {
    if (error instanceof ProbeCompileError && error.stderr) {
      logger.debug('Compiler output', { stderr: error.stderr });
    }
    return { ok: false, error: summarizeError(error) };
  }

  try {
    const tables: TablePresence[] = request.tables.map(name => ({ name, present: handle.has(name) }));
    return { ok: true, tables };
  } catch (error) {
    return { ok: false, error: summarizeError(error) };
  } finally {
    await release(handle);
  }
}

/**
 * Table presence is reported per table but does not affect `passed`:
 * the outcome reflects compilation alone.
 */
export async function checkProbeCompilation(runtime: ProbeRuntime, request: CompilationRequest): Promise<CheckOutcome> {
  const { probeSource } = request;

  if (!request.env.fileExists(probeSource.path)) {
    return createOutcome({
      id: 'probe-compilation',
      title: PROBE_COMPILATION_TITLE,
      passed: false,
      messages: [failureLine(`${probeSource.name} not found`)]
    });
  }

  const messages: MessageLine[] = [];
  const startedAt = Date.now();
  const result = await compileProbe(runtime, request);
  logger.info('Probe compilation finished', { ok: result.ok, durationMs: Date.now() - startedAt });

  if (!result.ok) {
    messages.push(failureLine(`Probe compilation failed: ${result.error}`));
    return createOutcome({ id: 'probe-compilation', title: PROBE_COMPILATION_TITLE, passed: false, messages });
  }

  messages.push(successLine('Probe program compiled successfully'));
  for (const table of result.tables) {
    messages.push(
      table.present
        ? successLine(`Table '${table.name}' found`, 1)
        : failureLine(`Table '${table.name}' not found`, 1)
    );
  }

  return createOutcome({ id: 'probe-compilation', title: PROBE_COMPILATION_TITLE, passed: true, messages });
}

/**
 * Recorded in place of the compilation outcome when an earlier gating check failed
 */
export function skippedProbeCompilation(): CheckOutcome {
  return createOutcome({
    id: 'probe-compilation',
    title: SKIPPED_COMPILATION_TITLE,
    passed: false,
    skipped: true,
    messages: [failureLine(SKIPPED_COMPILATION_TITLE)]
  });
}
