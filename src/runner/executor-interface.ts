export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandExecutor {
  // Rejects when the command cannot be spawned or exceeds the executor's timeout.
  exec(command: string): Promise<CommandResult>;
}

export type NodeRole = 'worker' | 'master' | 'storage';

export interface MonitoringConfig {
  node: {
    type: NodeRole;
  };
  etcd: {
    ips: string[];
  };
  registry: {
    ip?: string;
  };
  router: {
    ips: string[];
  };
  master: {
    apiUrl: string;
  };
  externalSystemUrl?: string;
  hawkularIp?: string;
  httpService: {
    url?: string;
  };
  projectsWithoutLimits: number;
  certificates: {
    paths: string[];
  };
  logging: {
    level: 'info' | 'debug';
  };
}
