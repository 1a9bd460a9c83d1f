// Report rendering - turns a ValidationReport into the lines printed on stdout

import { MessageKind, MessageLine, ValidationReport } from '../../models/types.js';

export const BANNER = '='.repeat(60);
export const REPORT_TITLE = 'eBPF Probe Agent - Preflight Validation';

const GLYPHS: Record<MessageKind, string> = {
  success: '✓',
  info: 'ℹ',
  failure: '✗',
  detail: ''
};

export function renderMessage(line: MessageLine): string {
  const glyph = GLYPHS[line.kind];
  return `${'  '.repeat(line.indent ?? 0)}${glyph ? `${glyph} ` : ''}${line.text}`;
}

export function renderReport(report: ValidationReport, title: string = REPORT_TITLE): string[] {
  const lines: string[] = [BANNER, title, BANNER, ''];

  report.outcomes.forEach((outcome, index) => {
    const number = index + 1;
    if (outcome.skipped) {
      // The heading already says why nothing ran
      lines.push(`${number}. ${outcome.title}`);
    } else {
      lines.push(`${number}. ${outcome.title}...`);
      lines.push(...outcome.messages.map(renderMessage));
    }
    lines.push('');
  });

  lines.push(BANNER);
  if (report.passed) {
    lines.push('✅ All validations passed!', '', 'System is ready to run the agent:', `  ${report.launchCommand}`);
  } else {
    lines.push('❌ Some validations failed', '', 'Please fix the issues above before running the agent.');
  }

  return lines;
}
