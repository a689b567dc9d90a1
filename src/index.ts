#!/usr/bin/env node

/**
 * Footswitch Bridge
 *
 * Turns presses on a wireless MIDI foot controller into mute-group,
 * level and soft-key commands for a mixing console on its MIDI TCP port.
 *
 * Usage:
 *   footswitch-bridge                      # Use config.yml in current directory
 *   footswitch-bridge --config ./my.yml    # Use a specific config file
 *   footswitch-bridge --verbose            # Debug logging
 *   footswitch-bridge --check              # Run systems check and exit
 *   footswitch-bridge --monitor            # Print controller input, no console
 *   footswitch-bridge --emulate            # Drive a local console emulator
 */

import { FootswitchBridge } from './bridge';
import { BridgeConfig, loadConfig } from './config';
import { ButtonMapping, InputEvent } from './dispatcher/types';
import { ConsoleEmulator } from './emulators/console-emulator';
import { toError } from './errors';
import { MidiInput } from './input/midi-input';
import { initLogger } from './logger';
import { SystemsCheck } from './systems-check';

export type CliMode = 'run' | 'check' | 'monitor' | 'emulate' | 'help';

export interface CliOptions {
  mode: CliMode;
  configPath?: string;
  /** Overrides input.device */
  device?: string;
  verbose: boolean;
  error?: string;
}

function printBanner(): void {
  console.log('');
  console.log('  Footswitch Bridge');
  console.log('  MIDI foot controller to console over MIDI TCP');
  console.log('');
}

function printUsage(): void {
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./config.yml)');
  console.log('    --device, -d <path>   MIDI input device (overrides input.device)');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --check               Run systems check and exit');
  console.log('    --monitor             Print controller input without connecting to the console');
  console.log('    --emulate             Start a local console emulator and connect to it');
  console.log('    --help, -h            Show this help');
  console.log('');
}

/** Parse process.argv. Never exits; errors are returned in `error`. */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { mode: 'run', verbose: false };
  const setMode = (mode: CliMode): void => {
    if (options.mode !== 'run' && options.mode !== mode && options.mode !== 'help') {
      options.error = `--${options.mode} and --${mode} cannot be combined`;
    }
    if (options.mode !== 'help') options.mode = mode;
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) options.error = '--config requires a path';
        break;
      case '--device':
      case '-d':
        options.device = argv[++i];
        if (!options.device) options.error = '--device requires a path';
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--check':
        setMode('check');
        break;
      case '--monitor':
        setMode('monitor');
        break;
      case '--emulate':
        setMode('emulate');
        break;
      case '--help':
      case '-h':
        options.mode = 'help';
        break;
      default:
        options.error = `Unknown option: ${arg}`;
    }
  }

  return options;
}

/** One line per input event for --monitor */
export function formatInputEvent(event: InputEvent, mapping?: ButtonMapping): string {
  const source = event.kind === 'note' ? `Note ${event.sourceCode}` : `CC ${event.sourceCode}`;
  const channel = event.channel !== undefined ? ` (ch ${event.channel + 1})` : '';
  const target = mapping ? `-> ${mapping.controllable}${mapping.label ? ` [${mapping.label}]` : ''}` : '-> unmapped';
  return `${source.padEnd(8)} value ${String(event.value).padStart(3)}${channel}  ${target}`;
}

async function runMonitor(device: string, buttons: readonly ButtonMapping[]): Promise<void> {
  const input = new MidiInput({ device });
  const mappings = new Map(buttons.map((b) => [b.code, b]));
  const close = (): void => input.close();
  process.on('SIGINT', close);
  process.on('SIGTERM', close);

  console.log(`  Reading ${device}. Press buttons on the controller; Ctrl+C to exit.`);
  console.log('');
  for await (const event of input.events()) {
    console.log(`  ${formatInputEvent(event, mappings.get(event.sourceCode))}`);
  }
  // An idle device read can stay parked in the thread pool after close()
  process.exit(0);
}

async function runCheck(config: BridgeConfig): Promise<void> {
  const report = await new SystemsCheck(config).run();
  console.log(SystemsCheck.formatConsoleReport(report));
  process.exit(report.overall === 'pass' ? 0 : 1);
}

async function runBridge(config: BridgeConfig, emulate: boolean): Promise<void> {
  let emulator: ConsoleEmulator | null = null;
  let runConfig = config;

  if (emulate) {
    emulator = new ConsoleEmulator({ livenessByte: config.transport.liveness.byte });
    const port = await emulator.start(0, '127.0.0.1');
    runConfig = { ...config, transport: { ...config.transport, address: { host: '127.0.0.1', port } } };
    console.log(`[Main] Console emulator on 127.0.0.1:${port}`);
  }

  const bridge = new FootswitchBridge(runConfig);
  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    bridge.stop()
      .then(() => emulator?.stop())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(`[Error] Shutdown failed: ${toError(err).message}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  bridge.start();
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);

  if (options.error) {
    console.error(`[Error] ${options.error}`);
    printUsage();
    process.exit(1);
  }
  if (options.mode === 'help') {
    printBanner();
    printUsage();
    process.exit(0);
  }

  printBanner();

  let config: BridgeConfig;
  try {
    config = loadConfig(options.configPath);
  } catch (err) {
    if (options.mode === 'check') {
      console.log(SystemsCheck.formatConsoleReport(SystemsCheck.configFailure(err)));
      process.exit(1);
    }
    // The monitor only needs a device path to be useful
    if (options.mode === 'monitor' && options.device) {
      initLogger({ level: options.verbose ? 'debug' : 'warn' });
      await runMonitor(options.device, []);
      return;
    }
    console.error(toError(err).message);
    process.exit(1);
  }

  if (options.device) {
    config = { ...config, input: { ...config.input, device: options.device } };
  }

  initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });

  switch (options.mode) {
    case 'check':
      await runCheck(config);
      return;
    case 'monitor':
      await runMonitor(config.input.device, config.dispatcher.buttons);
      return;
    case 'emulate':
    case 'run':
      await runBridge(config, options.mode === 'emulate');
      return;
  }
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Error] ${toError(err).message}`);
    process.exit(1);
  });
}
