/**
 * SystemsCheck: pre-show probe of everything the bridge depends on
 *
 * Checks, in order:
 *   1. the config loaded and every button resolves to addresses
 *   2. the MIDI input device path exists and is readable
 *   3. the console's MIDI TCP port accepts a connection
 *   4. a console session opens and takes one liveness frame
 *
 * Triggered via the CLI: --check
 */

import * as fs from 'fs';
import * as net from 'net';
import { BridgeConfig } from './config';
import { toError } from './errors';
import { buildLiveness } from './midi-protocol';
import { SessionTransport } from './transport/session-transport';
import { Connector } from './transport/types';

export interface CheckResult {
  name: string;
  type: 'config' | 'input' | 'console';
  status: 'pass' | 'fail' | 'warn';
  host?: string;
  port?: number;
  latencyMs?: number;
  detail: string;
}

export interface SystemsCheckReport {
  timestamp: string;
  durationMs: number;
  overall: 'pass' | 'fail';
  results: CheckResult[];
  summary: { pass: number; fail: number; warn: number; total: number };
}

export interface SystemsCheckOptions {
  connector?: Connector;
}

function summarize(results: CheckResult[], startTime: number): SystemsCheckReport {
  const summary = {
    pass: results.filter(r => r.status === 'pass').length,
    fail: results.filter(r => r.status === 'fail').length,
    warn: results.filter(r => r.status === 'warn').length,
    total: results.length,
  };

  return {
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - startTime,
    overall: summary.fail > 0 ? 'fail' : 'pass',
    results,
    summary,
  };
}

export class SystemsCheck {
  constructor(
    private readonly config: BridgeConfig,
    private readonly options: SystemsCheckOptions = {},
  ) {}

  async run(): Promise<SystemsCheckReport> {
    const startTime = Date.now();
    const results: CheckResult[] = [];

    results.push(this.checkConfig());
    results.push(await this.checkInput());

    const { host, port } = this.config.transport.address;
    const probe = await SystemsCheck.tcpProbe(host, port, this.config.transport.connectTimeoutMs);
    results.push({
      name: 'Console port',
      type: 'console',
      host,
      port,
      status: probe.ok ? 'pass' : 'fail',
      latencyMs: probe.ok ? probe.latencyMs : undefined,
      detail: probe.ok ? `Reachable (${probe.latencyMs}ms)` : `Unreachable: ${probe.error ?? 'unknown error'}`,
    });

    if (probe.ok) {
      results.push(await this.checkSession());
    } else {
      results.push({
        name: 'Console session',
        type: 'console',
        host,
        port,
        status: 'fail',
        detail: 'Skipped: console port unreachable',
      });
    }

    return summarize(results, startTime);
  }

  /** Report for a config that failed to load; nothing else can be checked */
  static configFailure(err: unknown): SystemsCheckReport {
    return summarize(
      [{ name: 'Config', type: 'config', status: 'fail', detail: toError(err).message }],
      Date.now(),
    );
  }

  private checkConfig(): CheckResult {
    const { dispatcher, source } = this.config;
    const buttons = dispatcher.buttons.map(b => `${b.code}->${b.controllable}`).join(', ');
    return {
      name: 'Config',
      type: 'config',
      status: 'pass',
      detail: `${source ?? 'inline'}: channel ${dispatcher.build.midiChannel + 1}, buttons ${buttons}`,
    };
  }

  private async checkInput(): Promise<CheckResult> {
    const device = this.config.input.device;
    try {
      await fs.promises.access(device, fs.constants.R_OK);
      return { name: 'MIDI input', type: 'input', status: 'pass', detail: `${device} readable` };
    } catch (err) {
      // The bridge keeps retrying the device, so a controller that is not paired yet is not fatal
      return {
        name: 'MIDI input',
        type: 'input',
        status: 'warn',
        detail: `${device}: ${toError(err).message}`,
      };
    }
  }

  private async checkSession(): Promise<CheckResult> {
    const { address, connectTimeoutMs, liveness } = this.config.transport;
    const transport = new SessionTransport({
      address,
      connectTimeoutMs,
      liveness: { ...liveness, intervalMs: 0 },
      connector: this.options.connector,
    });
    const result: CheckResult = {
      name: 'Console session',
      type: 'console',
      host: address.host,
      port: address.port,
      status: 'pass',
      detail: '',
    };

    const start = Date.now();
    try {
      const connected = await transport.connect();
      if (!connected.ok) {
        result.status = 'fail';
        result.detail = `Connect failed (${connected.error.kind}): ${connected.error.message}`;
        return result;
      }

      const sent = await transport.send([buildLiveness(liveness.byte)]);
      result.latencyMs = Date.now() - start;
      if (sent.ok) {
        result.detail = `Session opened, liveness 0x${liveness.byte.toString(16).toUpperCase()} sent`;
      } else {
        result.status = 'fail';
        result.detail = `Write failed (${sent.error.kind}): ${sent.error.message}`;
      }
      return result;
    } finally {
      transport.stop();
    }
  }

  /** TCP connect probe with timeout */
  static tcpProbe(
    host: string,
    port: number,
    timeoutMs = 2000,
  ): Promise<{ ok: boolean; latencyMs: number; error?: string }> {
    return new Promise((resolve) => {
      const start = Date.now();
      const socket = new net.Socket();

      const timer = setTimeout(() => {
        socket.destroy();
        resolve({ ok: false, latencyMs: Date.now() - start, error: 'timeout' });
      }, timeoutMs);

      socket.on('connect', () => {
        clearTimeout(timer);
        const latencyMs = Date.now() - start;
        socket.destroy();
        resolve({ ok: true, latencyMs });
      });

      socket.on('error', (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        resolve({ ok: false, latencyMs: Date.now() - start, error: err.message });
      });

      socket.connect(port, host);
    });
  }

  /** Format a systems check report for console output */
  static formatConsoleReport(report: SystemsCheckReport): string {
    const lines: string[] = [];
    const ts = report.timestamp.replace('T', ' ').replace(/\.\d+Z$/, '');
    const divider = '========================================';

    lines.push('');
    lines.push(divider);
    lines.push(`  SYSTEMS CHECK — ${ts}`);
    lines.push(divider);
    lines.push('');

    for (const r of report.results) {
      const tag = r.status === 'pass' ? '[PASS]'
        : r.status === 'fail' ? '[FAIL]'
        : '[WARN]';
      const hostCol = r.host && r.port ? `${r.host}:${r.port}` : '';

      lines.push(`  ${tag.padEnd(8)} ${r.name.padEnd(18)} ${r.detail.padEnd(40)} ${hostCol}`.trimEnd());
    }

    lines.push('');
    const resultLabel = report.overall === 'pass' ? 'PASS' : 'FAIL';
    lines.push(
      `  RESULT: ${resultLabel} (${report.summary.pass} pass, ${report.summary.fail} fail, ${report.summary.warn} warn)`,
    );
    lines.push(`  Completed in ${report.durationMs}ms`);
    lines.push(divider);
    lines.push('');

    return lines.join('\n');
  }
}
