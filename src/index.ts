#!/usr/bin/env node

/**
 * flaky-reconnectd
 *
 * Watches BlueZ for devices that drop their link right after connecting
 * and asks BlueZ to connect them again once the debounce window passes.
 * Devices that disconnect after a stable session are left alone.
 *
 * Usage:
 *   flaky-reconnectd                    # config.yml in current directory, system bus
 *   flaky-reconnectd --config ./my.yml  # Use a specific config file
 *   flaky-reconnectd --verbose          # Log every Connected transition
 *   flaky-reconnectd --window 5000      # Debounce window in ms
 *   flaky-reconnectd --session          # Use the session bus (testing)
 */

import { sessionBus, systemBus } from 'dbus-next';
import { loadConfig, DaemonConfig } from './config';
import { debounceWindowSchema } from './config-schema';
import { getLogger, initLogger } from './logger';
import { BluezClient } from './bus/bluez-client';
import { ReconnectDaemon } from './daemon';

export const PROCESS_TITLE = 'flaky-reconnectd';

export interface CliArgs {
  configPath?: string;
  verbose: boolean;
  session: boolean;
  windowMs?: number;
  help: boolean;
  errors: string[];
}

/**
 * Parse process.argv. Pure: problems are collected in `errors`
 * rather than exiting.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false, session: false, help: false, errors: [] };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = argv[++i];
        if (value === undefined) {
          args.errors.push(`${arg} requires a file path`);
        } else {
          args.configPath = value;
        }
        break;
      }
      case '--window':
      case '-w': {
        const value = argv[++i];
        const parsed = debounceWindowSchema.safeParse(value === undefined ? NaN : Number(value));
        if (parsed.success) {
          args.windowMs = parsed.data;
        } else {
          args.errors.push(`${arg} expects an integer between 100 and 60000 (ms), got ${value ?? 'nothing'}`);
        }
        break;
      }
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--session':
        args.session = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        args.errors.push(`Unknown option: ${arg}`);
    }
  }

  return args;
}

/** Command-line flags win over the config file */
export function applyCliOverrides(config: DaemonConfig, args: CliArgs): DaemonConfig {
  return {
    ...config,
    bus: args.session ? 'session' : config.bus,
    debounceWindowMs: args.windowMs ?? config.debounceWindowMs,
    logging: {
      ...config.logging,
      verbose: args.verbose || config.logging.verbose,
    },
  };
}

function printUsage(): void {
  console.log('');
  console.log('  flaky-reconnectd');
  console.log('  Reconnects Bluetooth devices that drop right after connecting');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./config.yml)');
  console.log('    --window, -w <ms>     Debounce window in ms (default 3000)');
  console.log('    --verbose, -v         Log every Connected transition');
  console.log('    --session             Use the session bus instead of the system bus');
  console.log('    --help, -h            Show this help');
  console.log('');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(`[Error] ${error}`);
    }
    process.exit(1);
  }

  let config: DaemonConfig;
  try {
    config = applyCliOverrides(loadConfig(args.configPath), args);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  initLogger({
    level: config.logging.verbose ? 'debug' : undefined,
    pretty: config.logging.pretty,
  });
  const log = getLogger('Main');
  process.title = PROCESS_TITLE;

  log.info(config.source ? `Config: ${config.source}` : 'No config file, using defaults');

  const bus = config.bus === 'session' ? sessionBus() : systemBus();
  bus.on('error', (err: unknown) => {
    log.error({ err }, 'Bus error');
  });

  const daemon = new ReconnectDaemon({
    client: new BluezClient({ bus }),
    debounceWindowMs: config.debounceWindowMs,
  });

  const shutdown = (signal: string): void => {
    log.info(`${signal} received, shutting down`);
    void daemon.stop().then(() => {
      bus.disconnect();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await daemon.start();
  } catch (err) {
    log.fatal({ err }, `Cannot subscribe to ${config.bus} bus`);
    bus.disconnect();
    process.exit(1);
  }
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
