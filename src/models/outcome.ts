// Builders for check outcomes and message lines

import { CheckId, CheckOutcome, MessageLine } from './types.js';

export function successLine(text: string, indent = 0): MessageLine {
  return indent > 0 ? { kind: 'success', text, indent } : { kind: 'success', text };
}

export function infoLine(text: string, indent = 0): MessageLine {
  return indent > 0 ? { kind: 'info', text, indent } : { kind: 'info', text };
}

export function failureLine(text: string, indent = 0): MessageLine {
  return indent > 0 ? { kind: 'failure', text, indent } : { kind: 'failure', text };
}

/**
 * Plain continuation text under another line, such as a remediation hint
 */
export function detailLine(text: string, indent = 1): MessageLine {
  return { kind: 'detail', text, indent };
}

/**
 * Build a frozen outcome. `gating` defaults to true and `skipped` to false.
 */
export function createOutcome(input: {
  id: CheckId;
  title: string;
  passed: boolean;
  messages: MessageLine[];
  gating?: boolean;
  skipped?: boolean;
}): CheckOutcome {
  return Object.freeze({
    id: input.id,
    title: input.title,
    passed: input.passed,
    gating: input.gating ?? true,
    skipped: input.skipped ?? false,
    messages: Object.freeze(input.messages.map(line => Object.freeze({ ...line })))
  });
}
