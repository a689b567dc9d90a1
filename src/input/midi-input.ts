/**
 * MIDI Input Adapter
 *
 * Turns the foot controller's raw MIDI byte stream into normalized input
 * events. On Linux a paired BLE MIDI controller shows up as an ALSA
 * rawmidi device (/dev/snd/midiCxDy), which reads like any other file.
 *
 * Control Change and Note On become { sourceCode, value }; Note Off is a
 * release with value 0. Everything else the parser recognizes is dropped.
 */

import { createReadStream } from 'fs';
import { Readable } from 'stream';
import { Clock, systemClock } from '../clock';
import { InputEvent } from '../dispatcher/types';
import { getLogger } from '../logger';
import { MIDIEvent, MIDIStreamParser } from '../midi-parser';

export type InputStreamFactory = (device: string) => Readable;

export interface MidiInputOptions {
  device: string;
  /** Opens the byte stream; defaults to reading the device path */
  openStream?: InputStreamFactory;
  /** Stamps `receivedAt` on each event as its chunk arrives */
  clock?: Clock;
}

const defaultOpenStream: InputStreamFactory = (device) => createReadStream(device);

/** Map one parsed MIDI message to an input event, or null if it carries none */
export function toInputEvent(event: MIDIEvent): InputEvent | null {
  switch (event.type) {
    case 'cc':
      return { sourceCode: event.controller, value: event.value, channel: event.channel, kind: 'cc' };
    case 'noteon':
      return { sourceCode: event.note, value: event.velocity, channel: event.channel, kind: 'note' };
    case 'noteoff':
      return { sourceCode: event.note, value: 0, channel: event.channel, kind: 'note' };
    default:
      return null;
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'latin1');
  throw new TypeError(`Unexpected chunk from MIDI input: ${typeof chunk}`);
}

export class MidiInput {
  readonly device: string;
  private openStream: InputStreamFactory;
  private clock: Clock;
  private stream: Readable | null = null;
  private closing = false;
  private wake: (() => void) | null = null;
  private log = getLogger('Input');

  constructor(options: MidiInputOptions) {
    this.device = options.device;
    this.openStream = options.openStream ?? defaultOpenStream;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Lazily read events until the stream ends or close() is called.
   * Read errors propagate to the consumer; a close() in progress ends the
   * sequence quietly instead.
   *
   * A file stream only honours destroy() once its pending read returns,
   * which on an idle device is never, so close() also wakes the loop
   * directly and leaves the stream to finish tearing down on its own.
   */
  async *events(): AsyncGenerator<InputEvent, void, undefined> {
    this.closing = false;
    const stream = this.openStream(this.device);
    const parser = new MIDIStreamParser();
    const chunks = stream[Symbol.asyncIterator]();
    const closed = new Promise<IteratorReturnResult<undefined>>((resolve) => {
      this.wake = () => resolve({ done: true, value: undefined });
    });
    this.stream = stream;
    this.log.info({ device: this.device }, 'MIDI input opened');

    try {
      for (;;) {
        const next: IteratorResult<unknown> = await Promise.race([chunks.next(), closed]);
        if (next.done || this.closing) break;

        const receivedAt = this.clock.now();
        for (const message of parser.feed(toBytes(next.value))) {
          const event = toInputEvent(message);
          if (event) yield { ...event, receivedAt };
        }
      }
    } catch (err) {
      if (!this.closing) throw err;
    } finally {
      stream.destroy();
      if (this.stream === stream) {
        this.stream = null;
        this.wake = null;
      }
    }
  }

  /** Stop reading. A pending events() iteration finishes without error. */
  close(): void {
    this.closing = true;
    this.wake?.();
    this.stream?.destroy();
  }
}
