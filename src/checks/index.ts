import type { MonitoringConfig, NodeRole } from '../runner/executor-interface.js';
import { log } from '../logging.js';
import { evaluate } from './classifier.js';
import { buildCheckPlan } from './plan.js';
import { assembleReport, healthyEvent } from './report.js';
import type { CheckPlanEntry, ProbeSet, Report, ReportEvent } from './types.js';

function describeEntry(entry: CheckPlanEntry): string {
  const params = Object.keys(entry.params).length > 0 ? ` ${JSON.stringify(entry.params)}` : '';
  return `${entry.severity} ${entry.name}${params}`;
}

// Entries run one at a time in plan order; a ConfigError from the plan stops the run first.
export async function runChecks(role: NodeRole, config: MonitoringConfig, probes: ProbeSet): Promise<Report> {
  log.info(`Running ${role} checks.`);

  const plan = buildCheckPlan(role, config, probes);
  log.debug(`Planned ${plan.length} check(s).`);

  const events: ReportEvent[] = [];

  for (const entry of plan) {
    log.debug(`Running ${describeEntry(entry)}`);
    const event = await evaluate(entry.run, entry.severity);
    if (event) {
      events.push(event);
    } else {
      log.debug(`Passed ${entry.severity} ${entry.name}`);
    }
  }

  if (events.length === 0) {
    events.push(healthyEvent());
  }

  log.info(`Finished ${plan.length} check(s) with ${events.filter(e => e.category !== 'HEALTHY').length} failure(s).`);
  return assembleReport(events);
}

export { buildCheckPlan } from './plan.js';
export { evaluate } from './classifier.js';
export {
  assembleReport,
  serializeReport,
  toWireFormat,
  createEvent,
  healthyEvent,
  HEALTHY_SUMMARY,
  INTEGRATION_NAME,
  INTEGRATION_VERSION,
  PROTOCOL_VERSION,
} from './report.js';
export type {
  CheckPlanEntry,
  EventCategory,
  Probe,
  ProbeOutcome,
  ProbeParams,
  ProbeSet,
  Report,
  ReportEvent,
  Severity,
} from './types.js';
