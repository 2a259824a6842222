import type { ProbeOutcome, ProbeSet } from '../../src/checks/types.js';
import { parseConfig } from '../../src/runner/config.js';
import type { MonitoringConfig } from '../../src/runner/executor-interface.js';

export type ProbeName = keyof ProbeSet;

export interface ProbeCall {
  probe: ProbeName;
  args: unknown[];
}

export type OutcomeFn = (probe: ProbeName, args: unknown[]) => ProbeOutcome | Promise<ProbeOutcome>;

export const PASS: OutcomeFn = () => ({ passed: true });

// Fails every probe with a message naming the probe and its arguments.
export const FAIL_ALL: OutcomeFn = (probe, args) => ({
  passed: false,
  message: `${probe}(${args.join(',')}) failed`,
});

export function stubProbes(outcome: OutcomeFn = PASS): { probes: ProbeSet; calls: ProbeCall[] } {
  const calls: ProbeCall[] = [];
  const call = (probe: ProbeName, ...args: unknown[]): Promise<ProbeOutcome> => {
    calls.push({ probe, args });
    return Promise.resolve(outcome(probe, args));
  };

  const probes: ProbeSet = {
    glusterdRunning: () => call('glusterdRunning'),
    mountPointUsage: thresholdPercent => call('mountPointUsage', thresholdPercent),
    lvPoolUsage: thresholdPercent => call('lvPoolUsage', thresholdPercent),
    vgFreeSpace: minFreePercent => call('vgFreeSpace', minFreePercent),
    openFileCount: () => call('openFileCount'),
    dockerPoolUsage: thresholdPercent => call('dockerPoolUsage', thresholdPercent),
    dnsKubernetesLookup: () => call('dnsKubernetesLookup'),
    dnsService: () => call('dnsService'),
    clusterNodesReady: () => call('clusterNodesReady'),
    etcdHealth: memberIps => call('etcdHealth', memberIps),
    registryHealth: ip => call('registryHealth', ip),
    routerHealth: ip => call('routerHealth', ip),
    masterApi: url => call('masterApi', url),
    externalSystem: url => call('externalSystem', url),
    hawkularHealth: ip => call('hawkularHealth', ip),
    httpService: url => call('httpService', url),
    routerRestartCount: maxRestarts => call('routerRestartCount', maxRestarts),
    loggingRestartCount: maxRestarts => call('loggingRestartCount', maxRestarts),
    limitsAndQuotas: allowed => call('limitsAndQuotas', allowed),
    ntpSync: () => call('ntpSync'),
    certificateExpiry: (paths, windowDays) => call('certificateExpiry', paths, windowDays),
  };

  return { probes, calls };
}

export function masterConfig(overrides: Record<string, unknown> = {}): MonitoringConfig {
  return parseConfig({
    node: { type: 'master' },
    etcd: { ips: '10.0.0.11,10.0.0.12' },
    registry: { ip: '172.30.0.10' },
    router: { ips: '10.0.0.1,10.0.0.2' },
    externalSystemUrl: 'https://status.example.com/health',
    hawkularIp: '10.0.0.30',
    projectsWithoutLimits: 2,
    ...overrides,
  });
}

export function roleConfig(type: 'worker' | 'storage', overrides: Record<string, unknown> = {}): MonitoringConfig {
  return parseConfig({ node: { type }, ...overrides });
}
