// Probe Runtime Availability Check - the probe compiler/loader must resolve on this host

import { ProbeRuntimeError, describeError, summarizeError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { createOutcome, detailLine, failureLine, successLine } from '../../models/outcome.js';
import { CheckOutcome, MessageLine } from '../../models/types.js';
import { ProbeRuntime } from '../probe/probe-runtime.js';
import { ProbeRuntimeLoader } from '../probe/runtime-loader.js';

export const PROBE_RUNTIME_TITLE = 'Checking probe runtime availability';

export interface ProbeRuntimeCheckResult {
  outcome: CheckOutcome;
  /** Present only when the check passed */
  runtime?: ProbeRuntime;
}

export async function checkProbeRuntime(
  loader: ProbeRuntimeLoader,
  specifier: string
): Promise<ProbeRuntimeCheckResult> {
  try {
    const runtime = await loader.resolve(specifier);
    return {
      outcome: createOutcome({
        id: 'probe-runtime',
        title: PROBE_RUNTIME_TITLE,
        passed: true,
        messages: [successLine(`Probe runtime available (${runtime.description})`)]
      }),
      runtime
    };
  } catch (error) {
    logger.debug('Probe runtime unavailable', { specifier, error: describeError(error) });

    const messages: MessageLine[] = [failureLine(`Probe runtime not found: ${summarizeError(error)}`)];
    if (error instanceof ProbeRuntimeError && error.remediation) {
      messages.push(detailLine(error.remediation));
    }

    return {
      outcome: createOutcome({ id: 'probe-runtime', title: PROBE_RUNTIME_TITLE, passed: false, messages })
    };
  }
}
