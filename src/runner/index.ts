import { parseArgs } from 'util';
import { runChecks, serializeReport, type ProbeSet } from '../checks/index.js';
import { errorMessage, log, setLogLevel } from '../logging.js';
import { createCommandProbes } from '../probes/index.js';
import { loadConfig } from './config.js';
import { LocalExecutor } from './local-executor.js';

export { loadConfig, parseConfig, splitAddresses } from './config.js';
export { ConfigError } from './errors.js';
export { LocalExecutor } from './local-executor.js';
export type { CommandExecutor, CommandResult, MonitoringConfig, NodeRole } from './executor-interface.js';

const USAGE = `
Usage: node-health-checks [options] [run]

Runs the major and minor monitoring checks for this node's role (worker,
master or storage) and prints one JSON report to stdout.

Options:
  -c, --config <path>       Path to config.yaml (default: config.yaml)
  -p, --pretty              Print indented JSON
  -d, --debug               Print debug messages to stderr
  -h, --help                Show this help message

Examples:
  node-health-checks --config /etc/node-health-checks/config.yaml
  node-health-checks -p -d
`;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c', default: 'config.yaml' },
      pretty: { type: 'boolean', short: 'p', default: false },
      debug: { type: 'boolean', short: 'd', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });
}

export interface CliDependencies {
  // Defaults to command probes on the local node.
  createProbes?: () => ProbeSet;
  write?: (text: string) => void;
}

// Exit code 0 whenever a report was written.
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(`${text}\n`));

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    log.critical(errorMessage(err));
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    write(USAGE);
    return 0;
  }

  const [command = 'run', ...extra] = positionals;
  if (command !== 'run' || extra.length > 0) {
    log.critical(`Unknown command: ${positionals.join(' ')}. Run with --help for usage information.`);
    return 1;
  }

  if (values.debug) {
    setLogLevel('debug');
  }

  const configPath = values.config ?? 'config.yaml';

  try {
    const config = loadConfig(configPath);
    if (config.logging.level === 'debug') {
      setLogLevel('debug');
    }

    const probes = deps.createProbes ? deps.createProbes() : createCommandProbes(new LocalExecutor());
    const report = await runChecks(config.node.type, config, probes);

    write(serializeReport(report, { pretty: values.pretty }));
    return 0;
  } catch (err) {
    log.critical(errorMessage(err));
    return 1;
  }
}
