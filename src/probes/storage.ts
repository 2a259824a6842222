import type { ProbeOutcome, ProbeSet } from '../checks/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { PASSED, columns, commandFailed, failed, outputLines, serviceActive } from './outcome.js';

const GLUSTER_MOUNT_PREFIX = '/gluster';
const DOCKER_POOL_LV = 'docker-pool';
const OPEN_FILES_LIMIT_PERCENT = 80;

const DF_COMMAND = 'df -P';
const LVS_COMMAND = 'lvs --noheadings --separator , -o lv_name,lv_attr,data_percent,metadata_percent';
const VGS_COMMAND = 'vgs --noheadings --units g --nosuffix --separator , -o vg_name,vg_size,vg_free';
const FILE_NR_COMMAND = 'cat /proc/sys/fs/file-nr';

export interface MountUsage {
  mount: string;
  usedPercent: number;
}

export interface LogicalVolume {
  name: string;
  attr: string;
  dataPercent?: number;
  metadataPercent?: number;
}

export interface VolumeGroup {
  name: string;
  sizeGb: number;
  freeGb: number;
}

export function parseDfOutput(output: string): MountUsage[] {
  // First line is the header.
  return outputLines(output).slice(1).flatMap(line => {
    const parts = columns(line);
    if (parts.length < 6) return [];
    const usedPercent = parseInt(parts[4], 10);
    if (Number.isNaN(usedPercent)) return [];
    return [{ mount: parts.slice(5).join(' '), usedPercent }];
  });
}

function parsePercent(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function parseLvsOutput(output: string): LogicalVolume[] {
  return outputLines(output).map(line => {
    const [name, attr = '', data, metadata] = line.split(',').map(part => part.trim());
    return {
      name,
      attr,
      dataPercent: parsePercent(data),
      metadataPercent: parsePercent(metadata),
    };
  });
}

export function parseVgsOutput(output: string): VolumeGroup[] {
  return outputLines(output).flatMap(line => {
    const [name, size, free] = line.split(',').map(part => part.trim());
    const sizeGb = parseFloat(size);
    const freeGb = parseFloat(free);
    if (!name || Number.isNaN(sizeGb) || Number.isNaN(freeGb)) return [];
    return [{ name, sizeGb, freeGb }];
  });
}

function poolUsage(lv: LogicalVolume): string {
  return `data ${lv.dataPercent ?? 0}%, metadata ${lv.metadataPercent ?? 0}%`;
}

function poolAbove(lv: LogicalVolume, thresholdPercent: number): boolean {
  return (lv.dataPercent ?? 0) > thresholdPercent || (lv.metadataPercent ?? 0) > thresholdPercent;
}

export function storageProbes(executor: CommandExecutor): Pick<
  ProbeSet,
  'glusterdRunning' | 'mountPointUsage' | 'lvPoolUsage' | 'vgFreeSpace' | 'openFileCount' | 'dockerPoolUsage'
> {
  async function listLogicalVolumes(): Promise<LogicalVolume[] | ProbeOutcome> {
    const result = await executor.exec(LVS_COMMAND);
    if (result.exitCode !== 0) return commandFailed('lvs', result);
    return parseLvsOutput(result.stdout);
  }

  return {
    glusterdRunning: () => serviceActive(executor, 'glusterd'),

    async mountPointUsage(thresholdPercent) {
      const result = await executor.exec(DF_COMMAND);
      if (result.exitCode !== 0) return commandFailed('df', result);

      const offenders = parseDfOutput(result.stdout)
        .filter(m => m.mount.startsWith(GLUSTER_MOUNT_PREFIX) && m.usedPercent > thresholdPercent)
        .map(m => `${m.mount} (${m.usedPercent}%)`);

      if (offenders.length === 0) return PASSED;
      return failed(`Mount point usage above ${thresholdPercent}%: ${offenders.join(', ')}`);
    },

    async lvPoolUsage(thresholdPercent) {
      const volumes = await listLogicalVolumes();
      if (!Array.isArray(volumes)) return volumes;

      const offenders = volumes
        .filter(lv => lv.attr.startsWith('t') && poolAbove(lv, thresholdPercent))
        .map(lv => `${lv.name} (${poolUsage(lv)})`);

      if (offenders.length === 0) return PASSED;
      return failed(`LV pool usage above ${thresholdPercent}%: ${offenders.join(', ')}`);
    },

    async vgFreeSpace(minFreePercent) {
      const result = await executor.exec(VGS_COMMAND);
      if (result.exitCode !== 0) return commandFailed('vgs', result);

      const offenders = parseVgsOutput(result.stdout)
        .filter(vg => vg.sizeGb > 0)
        .map(vg => ({ name: vg.name, freePercent: (vg.freeGb / vg.sizeGb) * 100 }))
        .filter(vg => vg.freePercent < minFreePercent)
        .map(vg => `${vg.name} (${vg.freePercent.toFixed(1)}% free)`);

      if (offenders.length === 0) return PASSED;
      return failed(`Volume groups below ${minFreePercent}% free space: ${offenders.join(', ')}`);
    },

    async openFileCount() {
      const result = await executor.exec(FILE_NR_COMMAND);
      if (result.exitCode !== 0) return commandFailed('reading file-nr', result);

      // allocated, unused, maximum
      const [allocated, , max] = columns(result.stdout).map(value => parseInt(value, 10));
      if (Number.isNaN(allocated) || !max) {
        return failed(`Unexpected file-nr output: ${result.stdout}`);
      }

      const usedPercent = (allocated / max) * 100;
      if (usedPercent <= OPEN_FILES_LIMIT_PERCENT) return PASSED;
      return failed(`Open file handles at ${usedPercent.toFixed(1)}% of maximum (${allocated}/${max})`);
    },

    async dockerPoolUsage(thresholdPercent) {
      const volumes = await listLogicalVolumes();
      if (!Array.isArray(volumes)) return volumes;

      const pool = volumes.find(lv => lv.name === DOCKER_POOL_LV);
      if (!pool) return failed(`Docker pool ${DOCKER_POOL_LV} not found`);

      if (!poolAbove(pool, thresholdPercent)) return PASSED;
      return failed(`Docker pool usage above ${thresholdPercent}%: ${poolUsage(pool)}`);
    },
  };
}
