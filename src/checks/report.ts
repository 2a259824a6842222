import type { EventCategory, Report, ReportEvent } from './types.js';

export const INTEGRATION_NAME = 'ch.sbb.openshift-integration';
export const PROTOCOL_VERSION = '1';
export const INTEGRATION_VERSION = '1.0.0';

export const HEALTHY_SUMMARY = 'system healthy';

// Key order here is what the monitoring pipeline sees on the wire.
interface SerializedReport {
  name: string;
  protocol_version: string;
  integration_version: string;
  events: Array<{ summary: string; category: EventCategory }>;
}

export interface SerializeOptions {
  pretty?: boolean;
}

export function createEvent(summary: string, category: EventCategory): ReportEvent {
  return Object.freeze({ summary, category });
}

export function healthyEvent(): ReportEvent {
  return createEvent(HEALTHY_SUMMARY, 'HEALTHY');
}

export function assembleReport(events: readonly ReportEvent[]): Report {
  return Object.freeze({
    name: INTEGRATION_NAME,
    protocolVersion: PROTOCOL_VERSION,
    integrationVersion: INTEGRATION_VERSION,
    events: Object.freeze([...events]),
  });
}

export function toWireFormat(report: Report): SerializedReport {
  return {
    name: report.name,
    protocol_version: report.protocolVersion,
    integration_version: report.integrationVersion,
    events: report.events.map(event => ({
      summary: event.summary,
      category: event.category,
    })),
  };
}

export function serializeReport(report: Report, options: SerializeOptions = {}): string {
  const wire = toWireFormat(report);
  return options.pretty ? JSON.stringify(wire, null, '\t') : JSON.stringify(wire);
}
