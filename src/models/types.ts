// Core type definitions for probe-preflight

// Message kinds, rendered as ✓ / ℹ / ✗; detail lines carry no glyph
export type MessageKind = 'success' | 'info' | 'failure' | 'detail';

// Checks in the order the orchestrator runs them
export type CheckId =
  | 'runtime-version'
  | 'artifacts'
  | 'probe-runtime'
  | 'probe-compilation'
  | 'privilege';

// Role an artifact plays for the agent
export type ArtifactRole = 'agent-entry' | 'probe-source' | 'probe-header';

/**
 * One human-readable line of a check's output
 */
export interface MessageLine {
  kind: MessageKind;
  text: string;
  /** Nesting level for sub-results, 0 when absent */
  indent?: number;
}

/**
 * Result of a single check invocation. Frozen once built.
 */
export interface CheckOutcome {
  id: CheckId;
  /** Section heading, e.g. "Checking required files" */
  title: string;
  passed: boolean;
  /** Whether `passed` contributes to the overall verdict */
  gating: boolean;
  /** True when prerequisites were not met and the check did not run */
  skipped: boolean;
  messages: readonly MessageLine[];
}

/**
 * A file that must exist in the working directory
 */
export interface RequiredArtifact {
  name: string;
  /** Path relative to the working directory */
  path: string;
  role: ArtifactRole;
}

/**
 * Per-table result after the probe is loaded
 */
export interface TablePresence {
  name: string;
  present: boolean;
}

/**
 * Outcome of the compile/load step as a value
 */
export type CompilationResult =
  | { ok: true; tables: TablePresence[] }
  | { ok: false; error: string };

/**
 * Ordered outcomes of one run plus the derived verdict
 */
export interface ValidationReport {
  outcomes: readonly CheckOutcome[];
  /** AND of `passed` over gating outcomes */
  passed: boolean;
  /** Command the user should run once the host is ready */
  launchCommand: string;
}

/**
 * Orchestrator progress
 */
export type OrchestratorState =
  | 'init'
  | 'version-checked'
  | 'files-checked'
  | 'runtime-checked'
  | 'compile-checked'
  | 'compile-skipped'
  | 'privilege-reported'
  | 'done';
