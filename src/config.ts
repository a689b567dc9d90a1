/**
 * Configuration loader
 *
 * Reads the YAML config file, validates it against the zod schema and
 * resolves it into the option objects the transport, dispatcher and input
 * adapter take. Any problem is a ConfigError; the CLI prints it and exits.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { BridgeConfigOutput, formatZodError, validateBridgeConfig } from './config-schema';
import { validateDispatcherConfig } from './dispatcher/operation-dispatcher';
import { DispatcherConfig } from './dispatcher/types';
import { ConfigError, toError } from './errors';
import { LivenessConfig, ReconnectConfig } from './health/types';
import { LoggerConfig } from './logger';
import { ControllerAddress, PacingConfig } from './transport/types';

export const DEFAULT_CONFIG_FILE = 'config.yml';

/** Runtime config used by the bridge */
export interface BridgeConfig {
  /** File the config came from, or null when parsed from a string */
  source: string | null;
  transport: {
    address: ControllerAddress;
    connectTimeoutMs: number;
    pacing: PacingConfig;
    liveness: LivenessConfig;
    reconnect: ReconnectConfig;
  };
  dispatcher: DispatcherConfig;
  input: {
    device: string;
    retryDelayMs: number;
  };
  logging: LoggerConfig;
}

/** Turn a validated document into the runtime config */
export function resolveConfig(validated: BridgeConfigOutput, source: string | null = null): BridgeConfig {
  const { console: desk, behaviors } = validated;

  const dispatcher: DispatcherConfig = {
    buttons: validated.buttons,
    debounceMs: validated.debounce.windowMs,
    behaviors: {
      recording: behaviors.recording,
      monitorLevel: behaviors.monitorLevel,
      fxMute: behaviors.fxMute,
      breakMode: behaviors.breakMode,
    },
    build: {
      addresses: validated.addresses,
      midiChannel: desk.midiChannel - 1,
      pulseGapMs: desk.keyPulseGapMs,
      muteValues: behaviors.muteValues,
    },
  };

  return {
    source,
    transport: {
      address: { host: desk.host, port: desk.port },
      connectTimeoutMs: desk.connectTimeoutMs,
      pacing: { interFrameDelayMs: desk.interFrameDelayMs },
      liveness: { intervalMs: desk.livenessIntervalMs, byte: desk.livenessByte },
      reconnect: validated.reconnect,
    },
    dispatcher,
    input: validated.input,
    logging: validated.logging,
  };
}

/**
 * Parse and validate YAML text. Also builds every operation the button
 * mapping can produce, so a missing address is reported here and not on
 * the first press during a show.
 */
export function parseConfig(text: string, source: string | null = null): BridgeConfig {
  const where = source ?? 'config';

  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    throw new ConfigError(`[Config] ${where}: invalid YAML: ${toError(error).message}`);
  }

  let config: BridgeConfig;
  try {
    config = resolveConfig(validateBridgeConfig(document ?? {}), source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed for ${where}:\n${formatZodError(error)}`);
    }
    throw error;
  }

  validateDispatcherConfig(config.dispatcher);
  return config;
}

/**
 * Load the config file. Relative paths resolve against the working
 * directory; with no path, config.yml in the working directory is used.
 */
export function loadConfig(configPath?: string): BridgeConfig {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigError(`[Config] No config file found at ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(raw, resolvedPath);
}
