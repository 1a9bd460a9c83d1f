// Privilege Info Check - advisory only, never part of the verdict

import { createOutcome, infoLine, successLine } from '../../models/outcome.js';
import { CheckOutcome, MessageLine } from '../../models/types.js';

export const PRIVILEGE_TITLE = 'Checking permissions';

const ROOT_UID = 0;

export function checkPrivilege(effectiveUid: number | undefined): CheckOutcome {
  const isRoot = effectiveUid === ROOT_UID;

  let message: MessageLine;
  if (effectiveUid === undefined) {
    message = infoLine('Effective user id not available on this platform');
  } else if (isRoot) {
    message = successLine('Running as root (optional for validation)');
  } else {
    message = infoLine('Not running as root (this is OK for validation)');
  }

  return createOutcome({
    id: 'privilege',
    title: PRIVILEGE_TITLE,
    passed: isRoot,
    gating: false,
    messages: [message]
  });
}
