// Tests for ProbeRuntimeAvailabilityCheck

import { describe, it, expect } from 'vitest';
import { checkProbeRuntime } from './probe-runtime-check.js';
import { ProbeRuntimeError } from '../../core/errors.js';
import { FakeLoader, FakeProbeRuntime } from '../../testing/fakes.js';

describe('checkProbeRuntime', () => {
  it('should pass and hand back the runtime', async () => {
    const runtime = new FakeProbeRuntime();
    const loader = new FakeLoader(runtime);

    const result = await checkProbeRuntime(loader, 'builtin:clang');

    expect(loader.calls).toEqual(['builtin:clang']);
    expect(result.runtime).toBe(runtime);
    expect(result.outcome.passed).toBe(true);
    expect(result.outcome.messages).toEqual([
      { kind: 'success', text: 'Probe runtime available (fake runtime 1.0)' }
    ]);
  });

  it('should report the missing dependency with a remediation hint', async () => {
    const loader = new FakeLoader(
      new ProbeRuntimeError('clang is not available (spawn clang ENOENT)', 'Install with: sudo apt-get install clang llvm')
    );

    const result = await checkProbeRuntime(loader, 'builtin:clang');

    expect(result.runtime).toBeUndefined();
    expect(result.outcome.passed).toBe(false);
    expect(result.outcome.messages).toEqual([
      { kind: 'failure', text: 'Probe runtime not found: clang is not available (spawn clang ENOENT)' },
      { kind: 'detail', text: 'Install with: sudo apt-get install clang llvm', indent: 1 }
    ]);
  });

  it('should convert unexpected errors into a failed outcome', async () => {
    const result = await checkProbeRuntime(new FakeLoader(new Error('boom')), 'some-runtime');

    expect(result.outcome.passed).toBe(false);
    expect(result.outcome.messages).toEqual([{ kind: 'failure', text: 'Probe runtime not found: boom' }]);
  });

  it('should keep only the first line of a multi-line tool error', async () => {
    const loader = new FakeLoader(new Error('Command failed with ENOENT: clang --version\nspawn clang ENOENT'));

    const result = await checkProbeRuntime(loader, 'builtin:clang');

    expect(result.outcome.messages).toEqual([
      { kind: 'failure', text: 'Probe runtime not found: Command failed with ENOENT: clang --version' }
    ]);
  });
});
