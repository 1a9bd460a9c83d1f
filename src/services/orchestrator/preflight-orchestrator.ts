// Preflight Orchestrator - runs the checks in order, gates compilation, aggregates the verdict

import { logger } from '../../core/logger.js';
import { VersionTriple, parseVersion } from '../../core/version.js';
import { DEFAULT_REQUIREMENTS, PreflightRequirements } from '../../models/requirements.js';
import { CheckOutcome, OrchestratorState, ValidationReport } from '../../models/types.js';
import { checkArtifacts } from '../checks/artifact-presence-check.js';
import { checkPrivilege } from '../checks/privilege-check.js';
import { checkProbeCompilation, skippedProbeCompilation } from '../checks/probe-compilation-check.js';
import { checkProbeRuntime } from '../checks/probe-runtime-check.js';
import { checkRuntimeVersion } from '../checks/runtime-version-check.js';
import { DEFAULT_SETTINGS, PreflightSettings } from '../config/config-service.js';
import { HostEnvironment } from '../environment/host-environment.js';
import { ProbeRuntimeLoader } from '../probe/runtime-loader.js';

/**
 * Number of outcomes every report carries
 */
export const CHECK_COUNT = 5;

export interface OrchestratorDeps {
  env: HostEnvironment;
  loader: ProbeRuntimeLoader;
  requirements?: PreflightRequirements;
  settings?: Partial<PreflightSettings>;
}

/**
 * Overall verdict: every gating outcome passed
 */
export function aggregate(outcomes: readonly CheckOutcome[]): boolean {
  return outcomes.filter(outcome => outcome.gating).every(outcome => outcome.passed);
}

export function exitCodeFor(report: ValidationReport): 0 | 1 {
  return report.passed ? 0 : 1;
}

export class PreflightOrchestrator {
  private readonly env: HostEnvironment;
  private readonly loader: ProbeRuntimeLoader;
  private readonly requirements: PreflightRequirements;
  private readonly settings: PreflightSettings;
  private state: OrchestratorState = 'init';

  constructor(deps: OrchestratorDeps) {
    this.env = deps.env;
    this.loader = deps.loader;
    this.requirements = deps.requirements ?? DEFAULT_REQUIREMENTS;
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
  }

  getState(): OrchestratorState {
    return this.state;
  }

  private transition(next: OrchestratorState): void {
    logger.debug('Orchestrator transition', { from: this.state, to: next });
    this.state = next;
  }

  private hostVersion(): VersionTriple {
    return parseVersion(this.env.runtimeVersion());
  }

  /**
   * Run every check once, in order. Checks are awaited one at a time.
   */
  async run(): Promise<ValidationReport> {
    const outcomes: CheckOutcome[] = [];

    outcomes.push(checkRuntimeVersion(this.hostVersion(), this.settings.minimumVersion));
    this.transition('version-checked');

    outcomes.push(checkArtifacts(this.requirements.artifacts, path => this.env.fileExists(path)));
    this.transition('files-checked');

    const runtimeCheck = await checkProbeRuntime(this.loader, this.settings.runtimeModule);
    outcomes.push(runtimeCheck.outcome);
    this.transition('runtime-checked');

    if (runtimeCheck.runtime && outcomes.every(outcome => outcome.passed)) {
      outcomes.push(
        await checkProbeCompilation(runtimeCheck.runtime, {
          probeSource: this.requirements.probeSource,
          tables: this.requirements.tables,
          cflags: [...this.requirements.cflags, ...this.settings.extraCflags],
          env: this.env
        })
      );
      this.transition('compile-checked');
    } else {
      outcomes.push(skippedProbeCompilation());
      this.transition('compile-skipped');
    }

    outcomes.push(checkPrivilege(this.env.effectiveUid()));
    this.transition('privilege-reported');

    const report: ValidationReport = {
      outcomes: Object.freeze(outcomes),
      passed: aggregate(outcomes),
      launchCommand: this.settings.launchCommand
    };
    this.transition('done');

    logger.info('Preflight finished', {
      passed: report.passed,
      failed: outcomes.filter(outcome => outcome.gating && !outcome.passed).map(outcome => outcome.id)
    });
    return report;
  }
}
