/**
 * Toggle State Store
 *
 * The bridge's own record of what the operator has asked for. It tracks
 * intent, not confirmed console state: there is no read-back channel.
 * Owned by one OperationDispatcher; every mutation happens on its event
 * path, one event at a time.
 */

export type MonitorLevel = 'low' | 'high';

export interface ToggleValues {
  recording: boolean;
  monitor_level: MonitorLevel;
  fx_mute: boolean;
  break_mode: boolean;
}

export type ControllableId = keyof ToggleValues;

export const CONTROLLABLE_IDS: readonly ControllableId[] = ['recording', 'monitor_level', 'fx_mute', 'break_mode'];

export const DEFAULT_TOGGLE_VALUES: Readonly<ToggleValues> = {
  recording: false,
  monitor_level: 'low',
  fx_mute: false,
  break_mode: false,
};

const MONITOR_LEVEL_PAIR: Record<MonitorLevel, MonitorLevel> = {
  low: 'high',
  high: 'low',
};

/** Flip a boolean or move a two-valued level to its paired alternate */
function alternate<K extends ControllableId>(id: K, value: ToggleValues[K]): ToggleValues[K];
function alternate(_id: ControllableId, value: boolean | MonitorLevel): boolean | MonitorLevel {
  if (typeof value === 'boolean') return !value;
  return MONITOR_LEVEL_PAIR[value];
}

export class ToggleStateStore {
  private values: ToggleValues = { ...DEFAULT_TOGGLE_VALUES };

  get<K extends ControllableId>(id: K): ToggleValues[K] {
    return this.values[id];
  }

  set<K extends ControllableId>(id: K, value: ToggleValues[K]): void {
    this.values[id] = value;
  }

  /** Advance `id` to its alternate value and return the new value */
  toggle<K extends ControllableId>(id: K): ToggleValues[K] {
    const next = alternate(id, this.values[id]);
    this.values[id] = next;
    return next;
  }

  snapshot(): Readonly<ToggleValues> {
    return { ...this.values };
  }

  /** Back to the start-of-process defaults: everything off, monitor low */
  reset(): void {
    this.values = { ...DEFAULT_TOGGLE_VALUES };
  }
}
