import { errorMessage, log } from '../logging.js';
import { createEvent } from './report.js';
import type { Probe, ProbeOutcome, ReportEvent, Severity } from './types.js';

// A probe that throws or rejects counts as a failed probe.
export async function evaluate(probe: Probe, severity: Severity): Promise<ReportEvent | undefined> {
  let outcome: ProbeOutcome;
  try {
    outcome = await probe();
  } catch (err) {
    outcome = { passed: false, message: errorMessage(err) };
  }

  if (outcome.passed) {
    return undefined;
  }

  log.error(`${severity}: ${outcome.message}`);
  return createEvent(outcome.message, severity);
}
