import type { ProbeOutcome, ProbeSet } from '../checks/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { PASSED, failed, serviceActive, shellQuote } from './outcome.js';

const KUBERNETES_SERVICE_HOST = 'kubernetes.default.svc.cluster.local';
const ETCD_CLIENT_PORT = 2379;
const REGISTRY_PORT = 5000;
const ROUTER_STATS_PORT = 1936;
const HTTP_TIMEOUT_SECONDS = 10;

export function curlCommand(url: string): string {
  return `curl -s -k -o /dev/null -m ${HTTP_TIMEOUT_SECONDS} -w '%{http_code}' ${shellQuote(url)}`;
}

export function etcdCommand(memberIps: readonly string[]): string {
  const endpoints = memberIps.map(ip => `https://${ip}:${ETCD_CLIENT_PORT}`).join(',');
  return `etcdctl --endpoints ${shellQuote(endpoints)} cluster-health`;
}

async function httpOk(executor: CommandExecutor, label: string, url: string): Promise<ProbeOutcome> {
  const result = await executor.exec(curlCommand(url));
  if (result.exitCode !== 0) {
    return failed(`${label} ${url} is unreachable (curl exit code ${result.exitCode})`);
  }

  const status = result.stdout.trim();
  if (status === '200') return PASSED;
  return failed(`${label} ${url} returned HTTP ${status}`);
}

export function networkProbes(executor: CommandExecutor): Pick<
  ProbeSet,
  | 'dnsKubernetesLookup'
  | 'dnsService'
  | 'etcdHealth'
  | 'registryHealth'
  | 'routerHealth'
  | 'masterApi'
  | 'externalSystem'
  | 'hawkularHealth'
  | 'httpService'
> {
  return {
    async dnsKubernetesLookup() {
      const result = await executor.exec(`nslookup ${KUBERNETES_SERVICE_HOST}`);
      if (result.exitCode === 0) return PASSED;
      return failed(`DNS lookup of ${KUBERNETES_SERVICE_HOST} failed`);
    },

    dnsService: () => serviceActive(executor, 'dnsmasq'),

    async etcdHealth(memberIps) {
      const result = await executor.exec(etcdCommand(memberIps));
      if (result.exitCode === 0 && result.stdout.includes('cluster is healthy')) return PASSED;
      return failed(`etcd cluster is not healthy (members ${memberIps.join(', ')})`);
    },

    registryHealth: ip => httpOk(executor, 'Registry', `http://${ip}:${REGISTRY_PORT}/healthz`),
    routerHealth: ip => httpOk(executor, 'Router', `http://${ip}:${ROUTER_STATS_PORT}/healthz`),
    masterApi: url => httpOk(executor, 'Master API', url),
    externalSystem: url => httpOk(executor, 'External system', url),
    hawkularHealth: ip => httpOk(executor, 'Hawkular metrics', `https://${ip}/hawkular/metrics/status`),
    httpService: url => httpOk(executor, 'HTTP service', url),
  };
}
