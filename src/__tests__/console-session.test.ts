import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { buildKeyPulse } from '../midi-protocol';
import { createSessionStats } from '../session-stats';
import { ConsoleSession } from '../transport/console-session';
import { FakeClock } from './helpers/fake-clock';
import { MockSocket } from './helpers/mock-socket';

function open(livenessMs = 0) {
  const clock = new FakeClock();
  const socket = new MockSocket(clock);
  const stats = createSessionStats('192.168.1.50', 51325);
  const session = new ConsoleSession({
    id: 7,
    address: { host: '192.168.1.50', port: 51325 },
    socket,
    clock,
    pacing: { interFrameDelayMs: 10 },
    liveness: { intervalMs: livenessMs, byte: 0xfe },
    stats,
  });
  return { clock, socket, stats, session };
}

describe('ConsoleSession', () => {
  it('is born connected', () => {
    const { session } = open();
    assert.equal(session.state, 'connected');
    assert.equal(session.isConnected(), true);
  });

  it('transmits a sequence and counts it', async () => {
    const { clock, socket, stats, session } = open();
    const pending = session.transmit(buildKeyPulse(0, 0x30, 50));
    await clock.advance(60);
    assert.deepEqual(await pending, { ok: true });
    assert.deepEqual(socket.frames, [[0x90, 0x30, 0x7f], [0x80, 0x30, 0x00]]);
    assert.equal(stats.sequencesSent, 1);
    assert.equal(stats.framesSent, 2);
  });

  it('close() ends the session once without recording an error', () => {
    const { socket, stats, session } = open(300);
    const reasons: string[] = [];
    session.on('disconnected', (reason: Error) => reasons.push(reason.message));

    session.close('Shutting down');
    session.close();

    assert.deepEqual(reasons, ['Shutting down']);
    assert.equal(socket.closed, true);
    assert.equal(stats.lastError, null);
  });

  it('is never reopened: transmit after close is not_connected', async () => {
    const { socket, session } = open();
    session.close();
    const result = await session.transmit(buildKeyPulse(0, 0x30, 50));
    assert.equal(!result.ok && result.error.kind, 'not_connected');
    assert.equal(socket.writes.length, 0);
  });

  it('a peer close records the error and stops the liveness pulse', () => {
    const { clock, socket, stats, session } = open(300);
    socket.peerClose(new Error('read ECONNRESET'));
    assert.equal(session.state, 'disconnected');
    assert.equal(stats.lastError, 'read ECONNRESET');
    assert.equal(clock.pendingTimers, 0);
  });

  it('uses the configured liveness byte', async () => {
    const clock = new FakeClock();
    const socket = new MockSocket(clock);
    const session = new ConsoleSession({
      id: 1,
      address: { host: 'localhost', port: 51325 },
      socket,
      clock,
      pacing: { interFrameDelayMs: 10 },
      liveness: { intervalMs: 100, byte: 0xf8 },
      stats: createSessionStats('localhost', 51325),
    });
    await clock.advance(100);
    assert.deepEqual(socket.frames, [[0xf8]]);
    session.close();
  });
});
