import type { ProbeSet } from '../checks/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { clusterProbes } from './cluster.js';
import { networkProbes } from './network.js';
import { storageProbes } from './storage.js';
import { systemProbes } from './system.js';

// Probes that inspect the local node by running commands through the executor.
export function createCommandProbes(executor: CommandExecutor): ProbeSet {
  return {
    ...storageProbes(executor),
    ...networkProbes(executor),
    ...clusterProbes(executor),
    ...systemProbes(executor),
  };
}
