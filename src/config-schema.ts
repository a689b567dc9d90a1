/**
 * Config Schema Validation
 *
 * Zod schemas for the bridge's YAML configuration. Every section except
 * `console.host` and `addresses` has defaults, so a minimal file names the
 * console and its parameter addresses and nothing else.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

/** A 7-bit MIDI data byte */
const dataByteSchema = z.number().int().min(0).max(0x7f);

const msSchema = z.number().int().min(0);

const groupIdSchema = z.number().int().min(1);

// --- Console ---

const consoleSchema = z.object({
  host: hostSchema,
  port: portSchema.default(51325),
  /** 1-16 as printed on the console; converted to 0-15 on load */
  midiChannel: z.number().int().min(1).max(16).default(1),
  connectTimeoutMs: z.number().int().min(100).default(5000),
  livenessIntervalMs: msSchema.default(300),
  livenessByte: z.number().int().min(0).max(0xff).default(0xfe),
  interFrameDelayMs: msSchema.default(10),
  keyPulseGapMs: msSchema.default(50),
});

const reconnectSchema = z.object({
  delayMs: z.number().int().min(100).default(2000),
  maxDelayMs: z.number().int().min(100).default(2000),
  multiplier: z.number().min(1).default(1),
}).refine((r) => r.maxDelayMs >= r.delayMs, {
  message: 'maxDelayMs must be at least delayMs',
  path: ['maxDelayMs'],
});

// --- Input ---

const inputSchema = z.object({
  device: z.string().min(1).default('/dev/snd/midiC1D0'),
  retryDelayMs: z.number().int().min(100).default(2000),
});

const debounceSchema = z.object({
  windowMs: msSchema.default(100),
});

// --- Buttons ---

const controllableSchema = z.enum(['recording', 'monitor_level', 'fx_mute', 'break_mode']);

const buttonSchema = z.object({
  code: dataByteSchema,
  controllable: controllableSchema,
  polarity: z.enum(['press', 'release']).default('press'),
  threshold: dataByteSchema.default(0),
  label: z.string().optional(),
});

const DEFAULT_BUTTONS: z.input<typeof buttonSchema>[] = [
  { code: 20, controllable: 'recording', label: 'A' },
  { code: 21, controllable: 'monitor_level', label: 'B' },
  { code: 22, controllable: 'fx_mute', label: 'C' },
  { code: 23, controllable: 'break_mode', label: 'D' },
];

// --- Address table ---

const parameterAddressSchema = z.object({
  msb: dataByteSchema,
  lsb: dataByteSchema,
});

const addressesSchema = z.object({
  levels: z.record(z.string().min(1), parameterAddressSchema).default({}),
  muteGroups: z.record(
    z.string().regex(/^[1-9]\d*$/, { message: 'Mute group ids must be positive integers' }),
    parameterAddressSchema,
  ).default({}),
  keys: z.record(z.string().min(1), dataByteSchema).default({ recording: 0x30 }),
});

// --- Behaviors ---

const sceneSchema = z.object({
  mute: z.array(groupIdSchema).default([]),
  unmute: z.array(groupIdSchema).default([]),
}).refine((s) => !s.mute.some((g) => s.unmute.includes(g)), {
  message: 'A group cannot be both muted and unmuted in one scene',
});

const behaviorsSchema = z.object({
  recording: z.object({
    key: z.string().min(1).default('recording'),
  }).default({}),
  monitorLevel: z.object({
    channel: z.string().min(1).default('aux_send'),
    levels: z.object({
      low: dataByteSchema.default(64),
      high: dataByteSchema.default(100),
    }).default({}),
  }).default({}),
  fxMute: z.object({
    group: groupIdSchema.default(1),
  }).default({}),
  breakMode: z.object({
    active: sceneSchema.default({}),
    inactive: sceneSchema.default({}),
  }).default({}),
  muteValues: z.object({
    on: dataByteSchema.default(127),
    off: dataByteSchema.default(0),
  }).default({}),
});

// --- Logging ---

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().optional(),
});

// --- Full Bridge Config Schema ---

export const bridgeConfigSchema = z.object({
  console: consoleSchema,
  reconnect: reconnectSchema.default({}),
  input: inputSchema.default({}),
  debounce: debounceSchema.default({}),
  buttons: z.array(buttonSchema).min(1).default(DEFAULT_BUTTONS),
  addresses: addressesSchema,
  behaviors: behaviorsSchema.default({}),
  logging: loggingSchema.default({}),
}).refine(
  (config) => {
    const codes = config.buttons.map((b) => b.code);
    return new Set(codes).size === codes.length;
  },
  { message: 'Duplicate button code detected', path: ['buttons'] }
);

// --- Type Exports ---

export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;
export type BridgeConfigOutput = z.output<typeof bridgeConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateBridgeConfig(data: unknown): BridgeConfigOutput {
  return bridgeConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
