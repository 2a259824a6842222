import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { MonitoringConfig } from './executor-interface.js';

export const DEFAULT_MASTER_API_URL = 'https://localhost:8443/api';

export function splitAddresses(value: string | string[] | null | undefined): string[] {
  if (value === null || value === undefined) return [];
  const parts = Array.isArray(value) ? value : value.split(',');
  return parts.map(part => part.trim()).filter(part => part.length > 0);
}

// YAML leaves an empty section as null; treat it like an absent one.
function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(value => value ?? {}, z.object(shape));
}

const OptionalStringSchema = z
  .string()
  .nullish()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const AddressListSchema = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform(splitAddresses);

// "node" is the older name for worker nodes.
const NodeRoleSchema = z.preprocess(
  value => (value === 'node' ? 'worker' : value),
  z.enum(['worker', 'master', 'storage']),
);

const MonitoringConfigSchema = z.object({
  node: z.object({
    type: NodeRoleSchema,
  }),
  etcd: section({
    ips: AddressListSchema,
  }),
  registry: section({
    ip: OptionalStringSchema,
  }),
  router: section({
    ips: AddressListSchema,
  }),
  master: section({
    apiUrl: OptionalStringSchema
      .transform(value => value ?? DEFAULT_MASTER_API_URL)
      .pipe(z.string().url()),
  }),
  externalSystemUrl: OptionalStringSchema,
  hawkularIp: OptionalStringSchema,
  httpService: section({
    url: OptionalStringSchema,
  }),
  projectsWithoutLimits: z.number().int().nonnegative().nullish().transform(value => value ?? 0),
  certificates: section({
    paths: z.array(z.string().min(1)).nullish().transform(value => value ?? []),
  }),
  logging: section({
    level: z.enum(['info', 'debug']).nullish().transform(value => value ?? 'info'),
  }),
});

export function parseConfig(raw: unknown): MonitoringConfig {
  const result = MonitoringConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config:\n${errors}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): MonitoringConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');

  let raw: unknown;
  try {
    raw = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfig(raw);
}
