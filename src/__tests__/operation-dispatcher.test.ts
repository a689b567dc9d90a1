import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import {
  OperationDispatcher,
  isTrigger,
  operationFor,
  validateDispatcherConfig,
} from '../dispatcher/operation-dispatcher';
import { ToggleStateStore } from '../dispatcher/toggle-state';
import { ButtonMapping } from '../dispatcher/types';
import { MissingAddressError, SendError } from '../errors';
import { FrameSequence } from '../midi-protocol';
import { SessionTransport } from '../transport/session-transport';
import { FrameSender, SendResult } from '../transport/types';
import { FakeClock } from './helpers/fake-clock';
import { TEST_ADDRESSES, groupFrames, testDispatcherConfig } from './helpers/fixtures';
import { MockConnector } from './helpers/mock-socket';

class RecordingSender implements FrameSender {
  readonly sent: FrameSequence[] = [];
  result: SendResult = { ok: true };

  async send(sequence: FrameSequence): Promise<SendResult> {
    this.sent.push(sequence);
    return this.result;
  }

  get lastBytes(): number[][] {
    const last = this.sent[this.sent.length - 1];
    return last ? last.map((f) => [...f.bytes]) : [];
  }
}

function setup(debounceMs = 0) {
  const clock = new FakeClock();
  const sender = new RecordingSender();
  const state = new ToggleStateStore();
  const dispatcher = new OperationDispatcher(testDispatcherConfig({ debounceMs }), sender, state, clock);
  return { clock, sender, state, dispatcher };
}

describe('isTrigger', () => {
  const press: ButtonMapping = { code: 20, controllable: 'recording', polarity: 'press', threshold: 0 };
  const release: ButtonMapping = { ...press, polarity: 'release' };

  it('press fires above the threshold', () => {
    assert.equal(isTrigger(press, 127), true);
    assert.equal(isTrigger(press, 1), true);
    assert.equal(isTrigger(press, 0), false);
  });

  it('release fires at or below the threshold', () => {
    assert.equal(isTrigger(release, 0), true);
    assert.equal(isTrigger(release, 127), false);
  });

  it('honors a custom threshold', () => {
    assert.equal(isTrigger({ ...press, threshold: 63 }, 63), false);
    assert.equal(isTrigger({ ...press, threshold: 63 }, 64), true);
  });
});

describe('operationFor', () => {
  const { behaviors } = testDispatcherConfig();

  it('maps each controllable to its operation', () => {
    assert.deepEqual(operationFor('recording', true, behaviors, TEST_ADDRESSES), { kind: 'pulse-key', code: 0x30 });
    assert.deepEqual(operationFor('monitor_level', 'high', behaviors, TEST_ADDRESSES), {
      kind: 'set-level',
      channelRef: 'aux_send',
      value: 100,
    });
    assert.deepEqual(operationFor('fx_mute', false, behaviors, TEST_ADDRESSES), {
      kind: 'set-group-state',
      groupId: 1,
      muted: false,
    });
    assert.deepEqual(operationFor('break_mode', true, behaviors, TEST_ADDRESSES), {
      kind: 'apply-scene',
      muteGroups: [1, 2, 4],
      unmuteGroups: [3],
    });
  });

  it('pulses the recording key whichever way the toggle went', () => {
    assert.deepEqual(
      operationFor('recording', false, behaviors, TEST_ADDRESSES),
      operationFor('recording', true, behaviors, TEST_ADDRESSES),
    );
  });

  it('throws MissingAddressError for an unknown recording key', () => {
    assert.throws(
      () => operationFor('recording', true, { ...behaviors, recording: { key: 'stream' } }, TEST_ADDRESSES),
      MissingAddressError,
    );
  });
});

describe('OperationDispatcher.handle', () => {
  it('reports unmapped codes without sending', async () => {
    const { dispatcher, sender } = setup();
    const result = await dispatcher.handle({ sourceCode: 64, value: 127 });
    assert.deepEqual(result, { status: 'unmapped', sourceCode: 64 });
    assert.equal(sender.sent.length, 0);
  });

  it('ignores the release half of a press', async () => {
    const { dispatcher, sender, state } = setup();
    const result = await dispatcher.handle({ sourceCode: 22, value: 0 });
    assert.deepEqual(result, { status: 'ignored', reason: 'polarity', controllable: 'fx_mute' });
    assert.equal(sender.sent.length, 0);
    assert.equal(state.get('fx_mute'), false);
  });

  it('button A pulses the recording key and flips recording', async () => {
    const { dispatcher, sender, state } = setup();
    const result = await dispatcher.handle({ sourceCode: 20, value: 127 });
    assert.equal(result.status, 'sent');
    assert.deepEqual(sender.lastBytes, [
      [0x90, 0x30, 0x7f],
      [0x80, 0x30, 0x00],
    ]);
    assert.equal(state.get('recording'), true);
  });

  it('button B alternates the monitor level between high and low', async () => {
    const { dispatcher, sender } = setup();
    await dispatcher.handle({ sourceCode: 21, value: 127 });
    assert.deepEqual(sender.lastBytes[3], [0xb0, 0x26, 100]);
    await dispatcher.handle({ sourceCode: 21, value: 127 });
    assert.deepEqual(sender.lastBytes[3], [0xb0, 0x26, 64]);
    assert.equal(dispatcher.toggles.monitor_level, 'low');
  });

  it('button C mutes then unmutes the FX group', async () => {
    const { dispatcher, sender } = setup();
    await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.deepEqual(sender.lastBytes, groupFrames(1, 127));
    await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.deepEqual(sender.lastBytes, groupFrames(1, 0));
  });

  it('button D applies the break scene, then the show scene', async () => {
    const { dispatcher, sender } = setup();
    const active = await dispatcher.handle({ sourceCode: 23, value: 127 });
    assert.equal(active.status === 'sent' && active.frames, 16);
    assert.deepEqual(sender.lastBytes, [
      ...groupFrames(1, 127),
      ...groupFrames(2, 127),
      ...groupFrames(4, 127),
      ...groupFrames(3, 0),
    ]);

    await dispatcher.handle({ sourceCode: 23, value: 127 });
    assert.deepEqual(sender.lastBytes, [
      ...groupFrames(3, 127),
      ...groupFrames(1, 0),
      ...groupFrames(2, 0),
      ...groupFrames(4, 0),
    ]);
  });

  it('accepts Note On events the same way as CC', async () => {
    const { dispatcher, state } = setup();
    const result = await dispatcher.handle({ sourceCode: 22, value: 100, kind: 'note' });
    assert.equal(result.status, 'sent');
    assert.equal(state.get('fx_mute'), true);
  });

  it('drops repeat presses inside the debounce window', async () => {
    const { dispatcher, sender, clock } = setup(100);
    await dispatcher.handle({ sourceCode: 22, value: 127 });
    await clock.advance(50);
    const repeat = await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.deepEqual(repeat, { status: 'ignored', reason: 'debounced', controllable: 'fx_mute' });
    await clock.advance(50);
    await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.equal(sender.sent.length, 2);
    assert.equal(dispatcher.toggles.fx_mute, false);
  });

  it('keeps the toggle when the send fails and does not retry', async () => {
    const { dispatcher, sender, state } = setup();
    sender.result = { ok: false, error: new SendError('not_connected', 'Not connected') };

    const result = await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.equal(result.status, 'dropped');
    assert.equal(result.status === 'dropped' && result.error.kind, 'not_connected');
    assert.equal(state.get('fx_mute'), true);
    assert.equal(sender.sent.length, 1);
  });

  it('returns failed instead of throwing when an address is missing', async () => {
    const clock = new FakeClock();
    const sender = new RecordingSender();
    const config = testDispatcherConfig({ debounceMs: 0 });
    const dispatcher = new OperationDispatcher(
      { ...config, behaviors: { ...config.behaviors, fxMute: { group: 8 } } },
      sender,
      undefined,
      clock,
    );
    const result = await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.equal(result.status, 'failed');
    assert.equal(sender.sent.length, 0);
  });

  it('mappingFor returns the configured button', () => {
    const { dispatcher } = setup();
    assert.equal(dispatcher.mappingFor(23)?.controllable, 'break_mode');
    assert.equal(dispatcher.mappingFor(99), undefined);
  });
});

describe('validateDispatcherConfig', () => {
  it('passes a complete config', () => {
    assert.doesNotThrow(() => validateDispatcherConfig(testDispatcherConfig()));
  });

  it('rejects a scene group with no address', () => {
    const config = testDispatcherConfig();
    const broken = {
      ...config,
      behaviors: { ...config.behaviors, breakMode: { active: { mute: [5], unmute: [] }, inactive: { mute: [], unmute: [5] } } },
    };
    assert.throws(() => validateDispatcherConfig(broken), /addresses\.muteGroups\.5/);
  });

  it('skips controllables no button maps', () => {
    const config = testDispatcherConfig({
      buttons: [{ code: 20, controllable: 'recording', polarity: 'press', threshold: 0 }],
    });
    const unused = { ...config, behaviors: { ...config.behaviors, fxMute: { group: 9 } } };
    assert.doesNotThrow(() => validateDispatcherConfig(unused));
  });
});

describe('dispatcher end to end over the session transport', () => {
  async function connected(debounceMs = 0) {
    const clock = new FakeClock();
    const connector = new MockConnector(clock);
    const transport = new SessionTransport({
      address: { host: '127.0.0.1', port: 51325 },
      liveness: { intervalMs: 0 },
      pacing: { interFrameDelayMs: 10 },
      connector: connector.connect,
      clock,
    });
    const result = await transport.connect();
    assert.equal(result.ok, true);
    const state = new ToggleStateStore();
    const dispatcher = new OperationDispatcher(testDispatcherConfig({ debounceMs }), transport, state, clock);
    return { clock, connector, transport, state, dispatcher };
  }

  it('code 20 writes the key pulse with the pulse gap between the frames', async () => {
    const { clock, connector, dispatcher } = await connected();
    const pending = dispatcher.handle({ sourceCode: 20, value: 127 });
    await clock.advance(100);
    const result = await pending;

    assert.equal(result.status, 'sent');
    assert.deepEqual(connector.lastSocket.frames, [
      [0x90, 0x30, 0x7f],
      [0x80, 0x30, 0x00],
    ]);
    assert.deepEqual(connector.lastSocket.times, [0, 50]);
  });

  it('break mode writes 16 frames spaced by the inter-frame delay', async () => {
    const { clock, connector, dispatcher } = await connected();
    const pending = dispatcher.handle({ sourceCode: 23, value: 127 });
    await clock.advance(200);
    await pending;

    const socket = connector.lastSocket;
    assert.deepEqual(socket.frames, [
      ...groupFrames(1, 127),
      ...groupFrames(2, 127),
      ...groupFrames(4, 127),
      ...groupFrames(3, 0),
    ]);
    assert.deepEqual(socket.times, Array.from({ length: 16 }, (_, i) => i * 10));
  });

  it('a press while disconnected is dropped and the toggle is kept', async () => {
    const { transport, state, dispatcher } = await connected();
    transport.stop();
    const result = await dispatcher.handle({ sourceCode: 22, value: 127 });
    assert.equal(result.status, 'dropped');
    assert.equal(result.status === 'dropped' && result.error.kind, 'not_connected');
    assert.equal(state.get('fx_mute'), true);
    assert.equal(transport.getStats().droppedSequences, 1);
  });
});
