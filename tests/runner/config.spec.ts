import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_MASTER_API_URL, loadConfig, parseConfig, splitAddresses } from '../../src/runner/config.js';
import { ConfigError } from '../../src/runner/errors.js';

describe('splitAddresses', () => {
  it('splits comma separated strings and trims entries', () => {
    expect(splitAddresses('10.0.0.1, 10.0.0.2,,')).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('keeps list order and drops blanks', () => {
    expect(splitAddresses([' 10.0.0.2', '', '10.0.0.1'])).toEqual(['10.0.0.2', '10.0.0.1']);
  });

  it('treats an absent value as no addresses', () => {
    expect(splitAddresses(undefined)).toEqual([]);
    expect(splitAddresses(null)).toEqual([]);
  });
});

describe('parseConfig', () => {
  it('normalizes a master config and fills defaults', () => {
    const config = parseConfig({
      node: { type: 'master' },
      etcd: { ips: '10.0.0.11, 10.0.0.12' },
      registry: { ip: '' },
      router: { ips: ['10.0.0.1', ' 10.0.0.2 '] },
    });

    expect(config).toEqual({
      node: { type: 'master' },
      etcd: { ips: ['10.0.0.11', '10.0.0.12'] },
      registry: { ip: undefined },
      router: { ips: ['10.0.0.1', '10.0.0.2'] },
      master: { apiUrl: DEFAULT_MASTER_API_URL },
      externalSystemUrl: undefined,
      hawkularIp: undefined,
      httpService: { url: undefined },
      projectsWithoutLimits: 0,
      certificates: { paths: [] },
      logging: { level: 'info' },
    });
  });

  it('falls back to the default master API url when it is left blank', () => {
    expect(parseConfig({ node: { type: 'master' }, master: { apiUrl: '' } }).master.apiUrl).toBe(DEFAULT_MASTER_API_URL);
    expect(parseConfig({ node: { type: 'master' }, master: { apiUrl: '  ' } }).master.apiUrl).toBe(DEFAULT_MASTER_API_URL);
  });

  it('trims a configured master API url', () => {
    const config = parseConfig({ node: { type: 'master' }, master: { apiUrl: ' https://10.0.0.5:8443/api ' } });
    expect(config.master.apiUrl).toBe('https://10.0.0.5:8443/api');
  });

  it('rejects a master API url that is not a url', () => {
    expect(() => parseConfig({ node: { type: 'master' }, master: { apiUrl: 'not a url' } }))
      .toThrow('Invalid config:\n  master.apiUrl: Invalid url');
  });

  it('accepts "node" as the worker role', () => {
    expect(parseConfig({ node: { type: 'node' } }).node.type).toBe('worker');
  });

  it('treats empty YAML sections as absent', () => {
    const config = parseConfig({ node: { type: 'worker' }, registry: null, etcd: null, logging: null });

    expect(config.registry.ip).toBeUndefined();
    expect(config.etcd.ips).toEqual([]);
    expect(config.logging.level).toBe('info');
  });

  it('rejects an unknown role', () => {
    expect(() => parseConfig({ node: { type: 'gateway' } })).toThrow(ConfigError);
    expect(() => parseConfig({ node: { type: 'gateway' } })).toThrow(/ {2}node\.type: Invalid enum value/);
  });

  it('requires the node section', () => {
    expect(() => parseConfig({ router: { ips: '10.0.0.1' } })).toThrow('Invalid config:\n  node: Required');
  });

  it('reports a document that is not a mapping', () => {
    expect(() => parseConfig(null)).toThrow('  (root): Expected object, received null');
  });

  it('rejects a negative allowance of projects without limits', () => {
    expect(() => parseConfig({ node: { type: 'master' }, projectsWithoutLimits: -1 }))
      .toThrow(/projectsWithoutLimits: Number must be greater than or equal to 0/);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'node-health-checks-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads YAML with dotted sections', () => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, [
      'node:',
      '  type: master',
      'etcd:',
      '  ips: 10.0.0.11,10.0.0.12',
      'router:',
      '  ips:',
      '    - 10.0.0.1',
      '    - 10.0.0.2',
      'hawkularIp: 10.0.0.30',
      'certificates:',
      '  paths: [/etc/origin/master/master.server.crt]',
      'logging:',
      '  level: debug',
    ].join('\n'));

    const config = loadConfig(file);

    expect(config.node.type).toBe('master');
    expect(config.etcd.ips).toEqual(['10.0.0.11', '10.0.0.12']);
    expect(config.router.ips).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(config.hawkularIp).toBe('10.0.0.30');
    expect(config.certificates.paths).toEqual(['/etc/origin/master/master.server.crt']);
    expect(config.logging.level).toBe('debug');
  });

  it('fails on a missing file', () => {
    const file = path.join(dir, 'absent.yaml');
    expect(() => loadConfig(file)).toThrow(`Config file not found: ${file}`);
  });

  it('fails on malformed YAML', () => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, 'node: [unclosed');

    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow(/is not valid YAML/);
  });
});
