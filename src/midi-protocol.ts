/**
 * Console MIDI Protocol
 *
 * Builds the frame sequences the console expects over its MIDI TCP port.
 * Pure functions only: no sockets, no timers, no state.
 *
 * NRPN parameter change (4 frames):
 *   BN 63 MSB   select coordinate high
 *   BN 62 LSB   select coordinate low
 *   BN 06 VH    data entry high  (value >> 7)
 *   BN 26 VL    data entry low   (value & 0x7F)
 *
 * Soft key pulse (2 frames):
 *   9N KK 7F    key activate
 *   8N KK 00    key release, sent after the pulse gap
 *
 * Liveness: a single byte (Active Sensing, 0xFE by default), sent alone.
 */

import { MissingAddressError } from './errors';

export const STATUS = {
  NOTE_OFF: 0x80,
  NOTE_ON: 0x90,
  CONTROL_CHANGE: 0xb0,
  ACTIVE_SENSING: 0xfe,
} as const;

export const NRPN_CC = {
  PARAM_MSB: 0x63,
  PARAM_LSB: 0x62,
  DATA_ENTRY_MSB: 0x06,
  DATA_ENTRY_LSB: 0x26,
} as const;

export const KEY_ACTIVATE_VELOCITY = 0x7f;

// --- Data model ---

export interface ParameterAddress {
  msb: number;
  lsb: number;
}

export interface AddressTable {
  /** Level parameters by channel reference, e.g. "aux_send" */
  levels: Readonly<Record<string, ParameterAddress>>;
  /** Mute group parameters by group id */
  muteGroups: Readonly<Record<string, ParameterAddress>>;
  /** Soft key note numbers by name, e.g. "recording" */
  keys: Readonly<Record<string, number>>;
}

export type LogicalOperation =
  | { kind: 'pulse-key'; code: number }
  | { kind: 'set-group-state'; groupId: number; muted: boolean }
  | { kind: 'set-level'; channelRef: string; value: number }
  | { kind: 'apply-scene'; muteGroups: readonly number[]; unmuteGroups: readonly number[] };

export interface Frame {
  bytes: readonly number[];
  /** Delay after this frame; the transport's inter-frame delay applies when absent */
  gapAfterMs?: number;
}

export type FrameSequence = readonly Frame[];

export interface BuildContext {
  addresses: AddressTable;
  /** 0-indexed MIDI channel */
  midiChannel: number;
  pulseGapMs: number;
  muteValues: { on: number; off: number };
}

// --- Frame builders ---

function clamp7(value: number): number {
  return Math.max(0, Math.min(0x7f, Math.round(value)));
}

/** Build the four NRPN frames for one parameter change */
export function buildParameterChange(midiChannel: number, address: ParameterAddress, value: number): Frame[] {
  const status = STATUS.CONTROL_CHANGE | (midiChannel & 0x0f);
  const v = clamp7(value);
  return [
    { bytes: [status, NRPN_CC.PARAM_MSB, address.msb & 0x7f] },
    { bytes: [status, NRPN_CC.PARAM_LSB, address.lsb & 0x7f] },
    { bytes: [status, NRPN_CC.DATA_ENTRY_MSB, v >> 7] },
    { bytes: [status, NRPN_CC.DATA_ENTRY_LSB, v & 0x7f] },
  ];
}

/** Build a soft key press: activate, pulse gap, release */
export function buildKeyPulse(midiChannel: number, code: number, pulseGapMs: number): Frame[] {
  const ch = midiChannel & 0x0f;
  const key = code & 0x7f;
  return [
    { bytes: [STATUS.NOTE_ON | ch, key, KEY_ACTIVATE_VELOCITY], gapAfterMs: pulseGapMs },
    { bytes: [STATUS.NOTE_OFF | ch, key, 0x00] },
  ];
}

export function buildLiveness(livenessByte: number = STATUS.ACTIVE_SENSING): Frame {
  return { bytes: [livenessByte & 0xff] };
}

// --- Address lookup ---

export function lookupMuteGroup(addresses: AddressTable, groupId: number): ParameterAddress {
  const address = addresses.muteGroups[String(groupId)];
  if (!address) throw new MissingAddressError('muteGroups', String(groupId));
  return address;
}

export function lookupLevel(addresses: AddressTable, channelRef: string): ParameterAddress {
  const address = addresses.levels[channelRef];
  if (!address) throw new MissingAddressError('levels', channelRef);
  return address;
}

export function lookupKey(addresses: AddressTable, name: string): number {
  const code = addresses.keys[name];
  if (code === undefined) throw new MissingAddressError('keys', name);
  return code;
}

function sortedUnique(groups: readonly number[]): number[] {
  return Array.from(new Set(groups)).sort((a, b) => a - b);
}

/**
 * Translate a logical operation into its frame sequence.
 *
 * Scenes emit every mute before any unmute, each set in ascending group
 * order, so the old and new audio paths are never open at the same time.
 *
 * @throws MissingAddressError when the operation names an unconfigured group or level
 */
export function build(operation: LogicalOperation, ctx: BuildContext): FrameSequence {
  switch (operation.kind) {
    case 'pulse-key':
      return buildKeyPulse(ctx.midiChannel, operation.code, ctx.pulseGapMs);

    case 'set-group-state': {
      const address = lookupMuteGroup(ctx.addresses, operation.groupId);
      const value = operation.muted ? ctx.muteValues.on : ctx.muteValues.off;
      return buildParameterChange(ctx.midiChannel, address, value);
    }

    case 'set-level': {
      const address = lookupLevel(ctx.addresses, operation.channelRef);
      return buildParameterChange(ctx.midiChannel, address, operation.value);
    }

    case 'apply-scene': {
      const frames: Frame[] = [];
      for (const groupId of sortedUnique(operation.muteGroups)) {
        frames.push(...build({ kind: 'set-group-state', groupId, muted: true }, ctx));
      }
      for (const groupId of sortedUnique(operation.unmuteGroups)) {
        frames.push(...build({ kind: 'set-group-state', groupId, muted: false }, ctx));
      }
      return frames;
    }
  }
}

/** One-line description of an operation for logs */
export function describeOperation(operation: LogicalOperation): string {
  switch (operation.kind) {
    case 'pulse-key':
      return `pulse key 0x${operation.code.toString(16).padStart(2, '0')}`;
    case 'set-group-state':
      return `${operation.muted ? 'mute' : 'unmute'} group ${operation.groupId}`;
    case 'set-level':
      return `set ${operation.channelRef} to ${operation.value}`;
    case 'apply-scene':
      return `scene mute [${operation.muteGroups.join(',')}] unmute [${operation.unmuteGroups.join(',')}]`;
  }
}

/** Hex dump of a frame sequence, e.g. "B0 63 04 | B0 62 00" */
export function formatFrames(sequence: FrameSequence): string {
  return sequence
    .map((f) => f.bytes.map((b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' '))
    .join(' | ');
}
