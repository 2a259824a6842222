export type Severity = 'MAJOR' | 'MINOR';

export type EventCategory = Severity | 'HEALTHY';

export interface ReportEvent {
  readonly summary: string;
  readonly category: EventCategory;
}

export type ProbeOutcome =
  | { passed: true }
  | { passed: false; message: string };

export type Probe = () => Promise<ProbeOutcome>;

export type ProbeParams = Readonly<Record<string, unknown>>;

export interface CheckPlanEntry {
  readonly name: string;
  readonly severity: Severity;

  // Bound at plan construction; run() already closes over these values.
  readonly params: ProbeParams;

  readonly run: Probe;
}

export interface Report {
  readonly name: string;
  readonly protocolVersion: string;
  readonly integrationVersion: string;
  readonly events: readonly ReportEvent[];
}

// The capability set the plan schedules. Each probe reports its own failures
// through ProbeOutcome and is expected to bound its own running time.
export interface ProbeSet {
  glusterdRunning(): Promise<ProbeOutcome>;
  mountPointUsage(thresholdPercent: number): Promise<ProbeOutcome>;
  lvPoolUsage(thresholdPercent: number): Promise<ProbeOutcome>;
  vgFreeSpace(minFreePercent: number): Promise<ProbeOutcome>;
  openFileCount(): Promise<ProbeOutcome>;
  dockerPoolUsage(thresholdPercent: number): Promise<ProbeOutcome>;

  dnsKubernetesLookup(): Promise<ProbeOutcome>;
  dnsService(): Promise<ProbeOutcome>;

  clusterNodesReady(): Promise<ProbeOutcome>;
  etcdHealth(memberIps: readonly string[]): Promise<ProbeOutcome>;
  registryHealth(ip: string): Promise<ProbeOutcome>;
  routerHealth(ip: string): Promise<ProbeOutcome>;
  masterApi(url: string): Promise<ProbeOutcome>;
  externalSystem(url: string): Promise<ProbeOutcome>;
  hawkularHealth(ip: string): Promise<ProbeOutcome>;
  httpService(url: string): Promise<ProbeOutcome>;
  routerRestartCount(maxRestarts: number): Promise<ProbeOutcome>;
  loggingRestartCount(maxRestarts: number): Promise<ProbeOutcome>;
  limitsAndQuotas(allowedWithoutLimits: number): Promise<ProbeOutcome>;

  ntpSync(): Promise<ProbeOutcome>;
  certificateExpiry(paths: readonly string[], windowDays: number): Promise<ProbeOutcome>;
}
