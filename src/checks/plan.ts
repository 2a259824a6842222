import type { MonitoringConfig, NodeRole } from '../runner/executor-interface.js';
import { ConfigError } from '../runner/errors.js';
import type { CheckPlanEntry, Probe, ProbeParams, ProbeSet, Severity } from './types.js';

// Thresholds are operational policy per role and tier, not derived values.
const STORAGE_THRESHOLDS: Record<Severity, { mountPointPercent: number; lvPoolPercent: number; vgMinFreePercent: number }> = {
  MAJOR: { mountPointPercent: 90, lvPoolPercent: 90, vgMinFreePercent: 5 },
  MINOR: { mountPointPercent: 85, lvPoolPercent: 80, vgMinFreePercent: 10 },
};

const DOCKER_POOL_PERCENT: Record<Severity, number> = {
  MAJOR: 90,
  MINOR: 80,
};

const CERTIFICATE_WINDOW_DAYS: Record<Severity, number> = {
  MAJOR: 30,
  MINOR: 60,
};

const MAX_POD_RESTARTS = 5;

function entry(name: string, severity: Severity, params: ProbeParams, run: Probe): CheckPlanEntry {
  return Object.freeze({ name, severity, params: Object.freeze({ ...params }), run });
}

function validateRequiredConfig(role: NodeRole, config: MonitoringConfig): void {
  if (role !== 'master') return;

  const missing: string[] = [];
  if (config.etcd.ips.length === 0) missing.push('etcd.ips');
  if (config.router.ips.length === 0) missing.push('router.ips');

  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration for role master: ${missing.join(', ')}`);
  }
}

function storageEntries(severity: Severity, probes: ProbeSet): CheckPlanEntry[] {
  const { mountPointPercent, lvPoolPercent, vgMinFreePercent } = STORAGE_THRESHOLDS[severity];
  const first = severity === 'MAJOR'
    ? entry('glusterd-running', severity, {}, () => probes.glusterdRunning())
    : entry('open-file-count', severity, {}, () => probes.openFileCount());

  return [
    first,
    entry('mount-point-usage', severity, { thresholdPercent: mountPointPercent },
      () => probes.mountPointUsage(mountPointPercent)),
    entry('lv-pool-usage', severity, { thresholdPercent: lvPoolPercent },
      () => probes.lvPoolUsage(lvPoolPercent)),
    entry('vg-free-space', severity, { minFreePercent: vgMinFreePercent },
      () => probes.vgFreeSpace(vgMinFreePercent)),
  ];
}

function dnsEntries(probes: ProbeSet): CheckPlanEntry[] {
  return [
    entry('dns-kubernetes-lookup', 'MAJOR', {}, () => probes.dnsKubernetesLookup()),
    entry('dns-service', 'MAJOR', {}, () => probes.dnsService()),
  ];
}

function httpServiceEntries(config: MonitoringConfig, probes: ProbeSet): CheckPlanEntry[] {
  const url = config.httpService.url;
  if (url === undefined) return [];
  return [entry('http-service', 'MINOR', { url }, () => probes.httpService(url))];
}

function majorEntries(role: NodeRole, config: MonitoringConfig, probes: ProbeSet): CheckPlanEntry[] {
  switch (role) {
    case 'storage':
      return storageEntries('MAJOR', probes);

    case 'worker': {
      const thresholdPercent = DOCKER_POOL_PERCENT.MAJOR;
      return [
        entry('docker-pool-usage', 'MAJOR', { thresholdPercent }, () => probes.dockerPoolUsage(thresholdPercent)),
        ...dnsEntries(probes),
      ];
    }

    case 'master': {
      const entries: CheckPlanEntry[] = [
        entry('cluster-nodes-ready', 'MAJOR', {}, () => probes.clusterNodesReady()),
      ];

      const memberIps = [...config.etcd.ips];
      entries.push(entry('etcd-health', 'MAJOR', { memberIps }, () => probes.etcdHealth(memberIps)));

      const registryIp = config.registry.ip;
      if (registryIp !== undefined) {
        entries.push(entry('registry-health', 'MAJOR', { ip: registryIp }, () => probes.registryHealth(registryIp)));
      }

      // One entry per router, each closing over its own address.
      for (const ip of config.router.ips) {
        entries.push(entry('router-health', 'MAJOR', { ip }, () => probes.routerHealth(ip)));
      }

      const apiUrl = config.master.apiUrl;
      entries.push(entry('master-api', 'MAJOR', { url: apiUrl }, () => probes.masterApi(apiUrl)));
      entries.push(...dnsEntries(probes));
      return entries;
    }
  }
}

function minorEntries(role: NodeRole, config: MonitoringConfig, probes: ProbeSet): CheckPlanEntry[] {
  switch (role) {
    case 'storage':
      return storageEntries('MINOR', probes);

    case 'worker': {
      const thresholdPercent = DOCKER_POOL_PERCENT.MINOR;
      return [
        entry('docker-pool-usage', 'MINOR', { thresholdPercent }, () => probes.dockerPoolUsage(thresholdPercent)),
        ...httpServiceEntries(config, probes),
      ];
    }

    case 'master': {
      const entries: CheckPlanEntry[] = [];

      const externalUrl = config.externalSystemUrl;
      if (externalUrl !== undefined) {
        entries.push(entry('external-system', 'MINOR', { url: externalUrl }, () => probes.externalSystem(externalUrl)));
      }

      const hawkularIp = config.hawkularIp;
      if (hawkularIp !== undefined) {
        entries.push(entry('hawkular-health', 'MINOR', { ip: hawkularIp }, () => probes.hawkularHealth(hawkularIp)));
      }

      const allowedWithoutLimits = config.projectsWithoutLimits;
      entries.push(
        entry('router-restart-count', 'MINOR', { maxRestarts: MAX_POD_RESTARTS },
          () => probes.routerRestartCount(MAX_POD_RESTARTS)),
        entry('limits-and-quotas', 'MINOR', { allowedWithoutLimits },
          () => probes.limitsAndQuotas(allowedWithoutLimits)),
        ...httpServiceEntries(config, probes),
        entry('logging-restart-count', 'MINOR', { maxRestarts: MAX_POD_RESTARTS },
          () => probes.loggingRestartCount(MAX_POD_RESTARTS)),
      );
      return entries;
    }
  }
}

function certificateEntries(severity: Severity, config: MonitoringConfig, probes: ProbeSet): CheckPlanEntry[] {
  if (config.certificates.paths.length === 0) return [];
  const paths = [...config.certificates.paths];
  const windowDays = CERTIFICATE_WINDOW_DAYS[severity];
  return [
    entry('certificate-expiry', severity, { paths, windowDays }, () => probes.certificateExpiry(paths, windowDays)),
  ];
}

// Role MAJOR, certificate MAJOR, role MINOR, certificate MINOR, then shared checks.
export function buildCheckPlan(role: NodeRole, config: MonitoringConfig, probes: ProbeSet): readonly CheckPlanEntry[] {
  validateRequiredConfig(role, config);

  return Object.freeze([
    ...majorEntries(role, config, probes),
    ...certificateEntries('MAJOR', config, probes),
    ...minorEntries(role, config, probes),
    ...certificateEntries('MINOR', config, probes),
    entry('ntp-sync', 'MINOR', {}, () => probes.ntpSync()),
  ]);
}
