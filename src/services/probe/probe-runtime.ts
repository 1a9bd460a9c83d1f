// Contract of the external probe compilation/loading library

/**
 * What to compile
 */
export interface ProbeLoadRequest {
  /** Absolute path to the probe source */
  srcFile: string;
  cflags: readonly string[];
}

/**
 * A compiled/loaded probe. Scoped to the check that created it.
 */
export interface ProbeHandle {
  /** Whether the probe exposes a data table of this name */
  has(tableName: string): boolean;
  /** Release whatever the load acquired */
  close(): Promise<void>;
}

/**
 * A probe compiler/loader. `load` rejects on any compile or load failure.
 */
export interface ProbeRuntime {
  /** Human-readable identification, e.g. "clang 17.0.6" */
  readonly description: string;
  load(request: ProbeLoadRequest): Promise<ProbeHandle>;
}

/**
 * Shape a third-party runtime module must export
 */
export interface ProbeRuntimeModule {
  createProbeRuntime(): ProbeRuntime | Promise<ProbeRuntime>;
}
