import { Command, InvalidArgumentError } from 'commander';
import type { SettingsOverrides } from './config.js';

// A type alias, not an interface, so it satisfies commander's OptionValues record
export type CliOptions = {
  config: string;
  sessionId?: string;
  dataCenter?: string;
  checkInterval?: number;
  outputDir?: string;
  verbose: boolean;
  statusPort?: number;
  controlDir: string;
};

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Must be a positive number.');
  return n;
}

function portNumber(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a port number.');
  const n = Number.parseInt(value, 10);
  if (n > 65535) throw new InvalidArgumentError('Must be a port number.');
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name('tiklive-monitor')
    .description('Watch TikTok LIVE accounts and record their broadcasts')
    .option('-c, --config <path>', 'roster/settings file', 'streamers_config.json')
    .option('-s, --session-id <id>', 'TikTok session id, overrides the file')
    .option('-d, --data-center <idc>', 'tt-target-idc of the session id, overrides the file')
    .option('-i, --check-interval <seconds>', 'seconds between check cycles', positiveNumber)
    .option('-o, --output-dir <dir>', 'directory for recordings and logs of events')
    .option('-v, --verbose', 'debug logging', false)
    .option('--status-port <port>', 'serve the status API on this port (0 disables it)', portNumber)
    .option('--control-dir <dir>', 'directory watched for STOP/PAUSE files', '.');
}

/** Parses argv (node-style, including the executable and script). Exits the process on bad input. */
export function parseCli(argv: readonly string[], program = buildProgram()): CliOptions {
  program.parse([...argv]);
  return program.opts<CliOptions>();
}

export function toOverrides(opts: CliOptions): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (opts.sessionId) overrides.sessionId = opts.sessionId;
  if (opts.dataCenter) overrides.targetIdc = opts.dataCenter;
  if (opts.checkInterval !== undefined) overrides.checkIntervalSeconds = opts.checkInterval;
  if (opts.outputDir) overrides.outputDirectory = opts.outputDir;
  if (opts.statusPort !== undefined) overrides.statusPort = opts.statusPort;
  return overrides;
}
