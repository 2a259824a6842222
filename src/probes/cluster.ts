import type { ProbeOutcome, ProbeSet } from '../checks/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { PASSED, columns, commandFailed, failed, outputLines } from './outcome.js';

const NODES_COMMAND = 'oc get nodes --no-headers';
const ROUTER_PODS_COMMAND = 'oc get pods -n default -l deploymentconfig=router --no-headers';
const LOGGING_PODS_COMMAND = 'oc get pods -n logging --no-headers';
const PROJECTS_COMMAND = 'oc get projects -o name';
const LIMIT_RANGES_COMMAND = 'oc get limitrange --all-namespaces --no-headers';

export interface PodRestarts {
  name: string;
  restarts: number;
}

export function parseNodeStatuses(output: string): Array<{ name: string; status: string }> {
  return outputLines(output).map(line => {
    const [name, status = ''] = columns(line);
    return { name, status };
  });
}

// NAME READY STATUS RESTARTS AGE; newer clients append "(2d ago)" after the count.
export function parsePodRestarts(output: string): PodRestarts[] {
  return outputLines(output).flatMap(line => {
    const parts = columns(line);
    const restarts = parseInt(parts[3] ?? '', 10);
    if (Number.isNaN(restarts)) return [];
    return [{ name: parts[0], restarts }];
  });
}

async function podRestarts(
  executor: CommandExecutor,
  label: string,
  command: string,
  maxRestarts: number,
): Promise<ProbeOutcome> {
  const result = await executor.exec(command);
  if (result.exitCode !== 0) return commandFailed('oc get pods', result);

  const offenders = parsePodRestarts(result.stdout)
    .filter(pod => pod.restarts > maxRestarts)
    .map(pod => `${pod.name} (${pod.restarts})`);

  if (offenders.length === 0) return PASSED;
  return failed(`${label} pods restarted more than ${maxRestarts} times: ${offenders.join(', ')}`);
}

export function clusterProbes(executor: CommandExecutor): Pick<
  ProbeSet,
  'clusterNodesReady' | 'routerRestartCount' | 'loggingRestartCount' | 'limitsAndQuotas'
> {
  return {
    async clusterNodesReady() {
      const result = await executor.exec(NODES_COMMAND);
      if (result.exitCode !== 0) return commandFailed('oc get nodes', result);

      // Masters report e.g. "Ready,SchedulingDisabled".
      const notReady = parseNodeStatuses(result.stdout)
        .filter(node => node.status.split(',')[0] !== 'Ready')
        .map(node => `${node.name} (${node.status})`);

      if (notReady.length === 0) return PASSED;
      return failed(`Nodes not ready: ${notReady.join(', ')}`);
    },

    routerRestartCount: maxRestarts => podRestarts(executor, 'Router', ROUTER_PODS_COMMAND, maxRestarts),
    loggingRestartCount: maxRestarts => podRestarts(executor, 'Logging', LOGGING_PODS_COMMAND, maxRestarts),

    async limitsAndQuotas(allowedWithoutLimits) {
      const projects = await executor.exec(PROJECTS_COMMAND);
      if (projects.exitCode !== 0) return commandFailed('oc get projects', projects);

      const limitRanges = await executor.exec(LIMIT_RANGES_COMMAND);
      if (limitRanges.exitCode !== 0) return commandFailed('oc get limitrange', limitRanges);

      const limited = new Set(outputLines(limitRanges.stdout).map(line => columns(line)[0]));
      const unlimited = outputLines(projects.stdout)
        .map(line => line.slice(line.lastIndexOf('/') + 1))
        .filter(project => !limited.has(project));

      if (unlimited.length <= allowedWithoutLimits) return PASSED;
      return failed(
        `${unlimited.length} projects without limit ranges (allowed ${allowedWithoutLimits}): ${unlimited.join(', ')}`,
      );
    },
  };
}
