// Tests for report rendering

import { describe, it, expect } from 'vitest';
import { BANNER, renderMessage, renderReport } from './report-renderer.js';
import { createOutcome, detailLine, failureLine, infoLine, successLine } from '../../models/outcome.js';
import { skippedProbeCompilation } from '../../services/checks/probe-compilation-check.js';
import { ValidationReport } from '../../models/types.js';

describe('renderMessage', () => {
  it('should prefix the glyph and indent nested lines', () => {
    expect(renderMessage(successLine('bpf.c exists'))).toBe('✓ bpf.c exists');
    expect(renderMessage(infoLine('Not running as root'))).toBe('ℹ Not running as root');
    expect(renderMessage(failureLine("Table 'events' not found", 1))).toBe("  ✗ Table 'events' not found");
  });

  it('should print detail lines indented without a glyph', () => {
    expect(renderMessage(detailLine('Install with: sudo apt-get install clang llvm'))).toBe(
      '  Install with: sudo apt-get install clang llvm'
    );
  });
});

describe('renderReport', () => {
  const version = createOutcome({
    id: 'runtime-version',
    title: 'Checking runtime version',
    passed: true,
    messages: [successLine('Node.js 20.11.1 (requires 20.0+)')]
  });

  it('should render a passing report with the launch command', () => {
    const report: ValidationReport = { outcomes: [version], passed: true, launchCommand: 'sudo node detector.js' };

    expect(renderReport(report, 'Title')).toEqual([
      BANNER,
      'Title',
      BANNER,
      '',
      '1. Checking runtime version...',
      '✓ Node.js 20.11.1 (requires 20.0+)',
      '',
      BANNER,
      '✅ All validations passed!',
      '',
      'System is ready to run the agent:',
      '  sudo node detector.js'
    ]);
  });

  it('should render a skipped check as its heading only', () => {
    const report: ValidationReport = {
      outcomes: [version, skippedProbeCompilation()],
      passed: false,
      launchCommand: 'sudo node detector.js'
    };

    const lines = renderReport(report);

    expect(lines.slice(4, 9)).toEqual([
      '1. Checking runtime version...',
      '✓ Node.js 20.11.1 (requires 20.0+)',
      '',
      '2. Skipping probe compilation (prerequisites not met)',
      ''
    ]);
    expect(lines.slice(-3)).toEqual([
      '❌ Some validations failed',
      '',
      'Please fix the issues above before running the agent.'
    ]);
  });

  it('should open with the default title', () => {
    const report: ValidationReport = { outcomes: [], passed: true, launchCommand: 'x' };
    expect(renderReport(report)[1]).toBe('eBPF Probe Agent - Preflight Validation');
    expect(BANNER).toHaveLength(60);
  });
});
