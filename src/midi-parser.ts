/**
 * MIDI Stream Parser
 *
 * Parses a raw MIDI byte stream into discrete messages. Handles running
 * status (controllers and desks both omit repeated status bytes) and
 * real-time bytes interleaved anywhere in the stream.
 *
 * Used on both ends of the bridge: the input adapter reads the foot
 * controller through it, and the console emulator decodes what the
 * bridge writes.
 */

import { EventEmitter } from 'events';
import { NRPN_CC } from './midi-protocol';

// --- Parsed MIDI event types ---

export interface MIDIControlChangeEvent {
  type: 'cc';
  channel: number;     // 0-indexed
  controller: number;
  value: number;
}

export interface MIDINoteOnEvent {
  type: 'noteon';
  channel: number;
  note: number;
  velocity: number;
}

export interface MIDINoteOffEvent {
  type: 'noteoff';
  channel: number;
  note: number;
  velocity: number;
}

export interface MIDIProgramChangeEvent {
  type: 'pc';
  channel: number;
  program: number;
}

export interface MIDINRPNEvent {
  type: 'nrpn';
  channel: number;
  paramMSB: number;    // CC99
  paramLSB: number;    // CC98
  /** 14-bit value: (CC6 << 7) | CC38. CC38 defaults to 0 until it arrives */
  value: number;
  /** true once the data entry LSB (CC38) has completed the value */
  fine: boolean;
}

export interface MIDIRealtimeEvent {
  type: 'realtime';
  status: number;      // 0xF8-0xFF, e.g. 0xFE active sensing
}

export type MIDIEvent =
  | MIDIControlChangeEvent
  | MIDINoteOnEvent
  | MIDINoteOffEvent
  | MIDIProgramChangeEvent
  | MIDINRPNEvent
  | MIDIRealtimeEvent;

// --- NRPN accumulator state per channel ---

interface NRPNState {
  paramMSB?: number;
  paramLSB?: number;
  valueMSB?: number;
}

export class MIDIStreamParser extends EventEmitter {
  private lastStatus = 0;
  private buffer: number[] = [];
  private inSysex = false;
  private nrpnState: Map<number, NRPNState> = new Map();

  /**
   * Feed raw bytes. Can be called with any chunk size; partial messages
   * carry over to the next call. Returns the complete messages in this
   * chunk and also emits each one as 'midi'.
   */
  feed(data: Uint8Array): MIDIEvent[] {
    const events: MIDIEvent[] = [];
    for (const byte of data) {
      const event = this.processByte(byte);
      if (event) {
        events.push(event);
        // NRPN is emitted alongside the CC that completed it
        if (event.type === 'cc') {
          const nrpn = this.handleNRPN(event);
          if (nrpn) events.push(nrpn);
        }
      }
    }
    for (const event of events) {
      this.emit('midi', event);
    }
    return events;
  }

  reset(): void {
    this.lastStatus = 0;
    this.buffer = [];
    this.inSysex = false;
    this.nrpnState.clear();
  }

  private processByte(byte: number): MIDIEvent | null {
    // Real-time messages can appear anywhere, even inside another message
    if (byte >= 0xf8) {
      return { type: 'realtime', status: byte };
    }

    if (byte === 0xf0) {
      this.inSysex = true;
      this.lastStatus = 0;
      this.buffer = [];
      return null;
    }

    // Other system common messages (0xF1-0xF7) end SysEx and cancel running status
    if (byte >= 0xf1 && byte <= 0xf7) {
      this.inSysex = false;
      this.lastStatus = 0;
      this.buffer = [];
      return null;
    }

    if (byte & 0x80) {
      this.inSysex = false;
      this.lastStatus = byte;
      this.buffer = [byte];
      return null;
    }

    if (this.inSysex) return null;

    // Data byte: reuse running status if no status in buffer
    if (this.buffer.length === 0) {
      if (this.lastStatus === 0) return null; // no status context, drop
      this.buffer = [this.lastStatus];
    }
    this.buffer.push(byte);

    return this.tryParse();
  }

  private tryParse(): MIDIEvent | null {
    const status = this.buffer[0];
    const msgType = status & 0xf0;
    const channel = status & 0x0f;
    const [, d1, d2] = this.buffer;

    switch (msgType) {
      case 0x80:
        if (this.buffer.length < 3) return null;
        this.buffer = [];
        return { type: 'noteoff', channel, note: d1, velocity: d2 };

      case 0x90:
        if (this.buffer.length < 3) return null;
        this.buffer = [];
        // Note On with velocity 0 is a Note Off by convention
        if (d2 === 0) return { type: 'noteoff', channel, note: d1, velocity: 0 };
        return { type: 'noteon', channel, note: d1, velocity: d2 };

      case 0xb0:
        if (this.buffer.length < 3) return null;
        this.buffer = [];
        return { type: 'cc', channel, controller: d1, value: d2 };

      case 0xc0:
        if (this.buffer.length < 2) return null;
        this.buffer = [];
        return { type: 'pc', channel, program: d1 };

      case 0xa0: // Poly aftertouch
      case 0xe0: // Pitch bend
        if (this.buffer.length >= 3) this.buffer = [];
        return null;

      case 0xd0: // Channel aftertouch
        if (this.buffer.length >= 2) this.buffer = [];
        return null;

      default:
        this.buffer = [];
        return null;
    }
  }

  /**
   * Accumulate NRPN CC messages: CC99 -> CC98 -> CC6 -> CC38.
   * A coarse event is emitted on CC6 and a fine one on CC38.
   */
  private handleNRPN(cc: MIDIControlChangeEvent): MIDINRPNEvent | null {
    let state = this.nrpnState.get(cc.channel);
    if (!state) {
      state = {};
      this.nrpnState.set(cc.channel, state);
    }

    switch (cc.controller) {
      case NRPN_CC.PARAM_MSB:
        state.paramMSB = cc.value;
        state.paramLSB = undefined;
        state.valueMSB = undefined;
        return null;

      case NRPN_CC.PARAM_LSB:
        state.paramLSB = cc.value;
        state.valueMSB = undefined;
        return null;

      case NRPN_CC.DATA_ENTRY_MSB:
        if (state.paramMSB === undefined || state.paramLSB === undefined) return null;
        state.valueMSB = cc.value;
        return {
          type: 'nrpn',
          channel: cc.channel,
          paramMSB: state.paramMSB,
          paramLSB: state.paramLSB,
          value: cc.value << 7,
          fine: false,
        };

      case NRPN_CC.DATA_ENTRY_LSB:
        if (state.paramMSB === undefined || state.paramLSB === undefined || state.valueMSB === undefined) {
          return null;
        }
        return {
          type: 'nrpn',
          channel: cc.channel,
          paramMSB: state.paramMSB,
          paramLSB: state.paramLSB,
          value: (state.valueMSB << 7) | cc.value,
          fine: true,
        };

      default:
        return null;
    }
  }
}
