/**
 * SessionStats: lightweight per-transport telemetry
 *
 * Updated by the transport and its sessions as frames go out and the
 * connection comes and goes. Read by the systems check and logged on
 * shutdown.
 */

export interface SessionStats {
  host: string;
  port: number;
  connected: boolean;
  connectCount: number;
  reconnectCount: number;
  failedConnectAttempts: number;
  sequencesSent: number;
  framesSent: number;
  livenessSent: number;
  droppedSequences: number;
  lastConnectedAt: number | null;
  lastDisconnectedAt: number | null;
  lastError: string | null;
  lastErrorAt: number | null;
}

export function createSessionStats(host: string, port: number): SessionStats {
  return {
    host,
    port,
    connected: false,
    connectCount: 0,
    reconnectCount: 0,
    failedConnectAttempts: 0,
    sequencesSent: 0,
    framesSent: 0,
    livenessSent: 0,
    droppedSequences: 0,
    lastConnectedAt: null,
    lastDisconnectedAt: null,
    lastError: null,
    lastErrorAt: null,
  };
}

export function recordError(stats: SessionStats, err: Error, at: number): void {
  stats.lastError = err.message;
  stats.lastErrorAt = at;
}

/** Single-line summary for logs */
export function formatStats(stats: SessionStats): string {
  return [
    `${stats.host}:${stats.port}`,
    stats.connected ? 'connected' : 'disconnected',
    `${stats.sequencesSent} sequences`,
    `${stats.framesSent} frames`,
    `${stats.livenessSent} liveness`,
    `${stats.droppedSequences} dropped`,
    `${stats.reconnectCount} reconnects`,
  ].join(', ');
}
