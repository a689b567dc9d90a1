/**
 * Operation Dispatcher
 *
 * The button-event state machine. The only place input events get a
 * meaning: source code -> controllable -> toggle -> logical operation ->
 * frames -> transport.
 *
 * Toggle state follows operator intent. A press that cannot be sent
 * (console offline) still flips local state and is not rolled back, and
 * the frames are not queued for later.
 */

import { Clock, systemClock } from '../clock';
import { toError } from '../errors';
import { getLogger } from '../logger';
import { AddressTable, build, describeOperation, FrameSequence, LogicalOperation, lookupKey } from '../midi-protocol';
import { FrameSender } from '../transport/types';
import { Debouncer } from './debouncer';
import { ControllableId, CONTROLLABLE_IDS, MonitorLevel, ToggleStateStore, ToggleValues } from './toggle-state';
import { Behaviors, ButtonMapping, DispatchResult, DispatcherConfig, InputEvent } from './types';

/** Does this event value fire the button under its polarity? */
export function isTrigger(mapping: ButtonMapping, value: number): boolean {
  return mapping.polarity === 'press' ? value > mapping.threshold : value <= mapping.threshold;
}

/**
 * The logical operation for a controllable that has just moved to `value`.
 * Recording pulses the soft key on every press whatever the new value:
 * the console owns the recorder state and the key is momentary.
 *
 * @throws MissingAddressError when the recording key is not configured
 */
export function operationFor<K extends ControllableId>(
  controllable: K,
  value: ToggleValues[K],
  behaviors: Behaviors,
  addresses: AddressTable,
): LogicalOperation;
export function operationFor(
  controllable: ControllableId,
  value: boolean | MonitorLevel,
  behaviors: Behaviors,
  addresses: AddressTable,
): LogicalOperation {
  switch (controllable) {
    case 'recording':
      return { kind: 'pulse-key', code: lookupKey(addresses, behaviors.recording.key) };
    case 'monitor_level': {
      const level = value === 'high' ? 'high' : 'low';
      return { kind: 'set-level', channelRef: behaviors.monitorLevel.channel, value: behaviors.monitorLevel.levels[level] };
    }
    case 'fx_mute':
      return { kind: 'set-group-state', groupId: behaviors.fxMute.group, muted: value === true };
    case 'break_mode': {
      const scene = value === true ? behaviors.breakMode.active : behaviors.breakMode.inactive;
      return { kind: 'apply-scene', muteGroups: scene.mute, unmuteGroups: scene.unmute };
    }
  }
}

function describeState(controllable: ControllableId, value: ToggleValues[ControllableId], behaviors: Behaviors): string {
  switch (controllable) {
    case 'recording':
      return `Recording: ${value ? 'STARTED' : 'STOPPED'}`;
    case 'monitor_level':
      return `Monitor level: ${String(value).toUpperCase()}`;
    case 'fx_mute':
      return `FX mute group ${behaviors.fxMute.group}: ${value ? 'ON' : 'OFF'}`;
    case 'break_mode':
      return `Break mode: ${value ? 'ACTIVE' : 'INACTIVE'}`;
  }
}

export class OperationDispatcher {
  private mappings: Map<number, ButtonMapping> = new Map();
  private debouncer: Debouncer;
  private log = getLogger('Dispatcher');

  constructor(
    private readonly config: DispatcherConfig,
    private readonly sender: FrameSender,
    private readonly state: ToggleStateStore = new ToggleStateStore(),
    clock: Clock = systemClock,
  ) {
    for (const mapping of config.buttons) {
      this.mappings.set(mapping.code, mapping);
    }
    this.debouncer = new Debouncer(config.debounceMs, clock);
  }

  /** Read-only view of the toggle state */
  get toggles(): Readonly<ToggleValues> {
    return this.state.snapshot();
  }

  /** Mapping for a source code, if any */
  mappingFor(sourceCode: number): ButtonMapping | undefined {
    return this.mappings.get(sourceCode);
  }

  /**
   * Handle one input event to completion. Fires zero or one logical
   * operation. Never throws.
   */
  async handle(event: InputEvent): Promise<DispatchResult> {
    const mapping = this.mappings.get(event.sourceCode);
    if (!mapping) {
      this.log.debug({ sourceCode: event.sourceCode, value: event.value }, 'Unmapped input');
      return { status: 'unmapped', sourceCode: event.sourceCode };
    }

    const controllable = mapping.controllable;
    if (!isTrigger(mapping, event.value)) {
      return { status: 'ignored', reason: 'polarity', controllable };
    }
    if (!this.debouncer.accept(event.sourceCode, event.receivedAt)) {
      this.log.debug({ sourceCode: event.sourceCode, controllable }, 'Repeat press ignored');
      return { status: 'ignored', reason: 'debounced', controllable };
    }

    const value = this.state.toggle(controllable);

    let operation: LogicalOperation;
    let frames: FrameSequence;
    try {
      operation = operationFor(controllable, value, this.config.behaviors, this.config.build.addresses);
      frames = build(operation, this.config.build);
    } catch (err) {
      const error = toError(err);
      this.log.error({ controllable, error: error.message }, 'Could not build operation');
      return { status: 'failed', controllable, error };
    }

    const result = await this.sender.send(frames);
    const summary = describeState(controllable, value, this.config.behaviors);

    if (!result.ok) {
      this.log.warn(
        { controllable, operation: describeOperation(operation), kind: result.error.kind },
        `${summary} (not sent: ${result.error.message})`,
      );
      return { status: 'dropped', controllable, value, operation, error: result.error };
    }

    this.log.info({ controllable, operation: describeOperation(operation) }, summary);
    return { status: 'sent', controllable, value, operation, frames: frames.length };
  }
}

/**
 * Build every operation the config can produce so a missing address fails
 * at startup rather than on a live press.
 *
 * @throws MissingAddressError
 */
export function validateDispatcherConfig(config: DispatcherConfig): void {
  const { behaviors, build: ctx } = config;
  const mapped = new Set<ControllableId>(config.buttons.map((b) => b.controllable));

  for (const id of CONTROLLABLE_IDS) {
    if (!mapped.has(id)) continue;
    const values: Array<boolean | MonitorLevel> = id === 'monitor_level' ? ['low', 'high'] : [true, false];
    for (const value of values) {
      build(operationFor(id, value, behaviors, ctx.addresses), ctx);
    }
  }
}
