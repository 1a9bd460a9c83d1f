// Artifact Presence Check - every required file must exist in the working directory

import { createOutcome, failureLine, successLine } from '../../models/outcome.js';
import { CheckOutcome, MessageLine, RequiredArtifact } from '../../models/types.js';

export const ARTIFACTS_TITLE = 'Checking required files';

/**
 * One line per artifact, in declared order. A missing file is a failed
 * outcome, never an error.
 */
export function checkArtifacts(
  artifacts: readonly RequiredArtifact[],
  fileExists: (relativePath: string) => boolean
): CheckOutcome {
  const messages: MessageLine[] = [];
  let allExist = true;

  for (const artifact of artifacts) {
    if (fileExists(artifact.path)) {
      messages.push(successLine(`${artifact.name} exists`));
    } else {
      messages.push(failureLine(`${artifact.name} not found`));
      allExist = false;
    }
  }

  return createOutcome({ id: 'artifacts', title: ARTIFACTS_TITLE, passed: allExist, messages });
}

