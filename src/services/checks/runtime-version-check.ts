// Runtime Version Check - host runtime must be at least the required (major, minor)

import { createOutcome, failureLine, successLine } from '../../models/outcome.js';
import { CheckOutcome } from '../../models/types.js';
import { VersionTriple, formatRequirement, formatVersion, meetsMinimum } from '../../core/version.js';

export const RUNTIME_VERSION_TITLE = 'Checking runtime version';

export function checkRuntimeVersion(
  version: VersionTriple,
  minimum: Pick<VersionTriple, 'major' | 'minor'>,
  runtimeName = 'Node.js'
): CheckOutcome {
  const passed = meetsMinimum(version, minimum);
  const text = `${runtimeName} ${formatVersion(version)} (requires ${formatRequirement(minimum)})`;

  return createOutcome({
    id: 'runtime-version',
    title: RUNTIME_VERSION_TITLE,
    passed,
    messages: [passed ? successLine(text) : failureLine(text)]
  });
}
