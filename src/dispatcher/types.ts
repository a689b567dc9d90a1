import { SendError } from '../errors';
import { BuildContext, LogicalOperation } from '../midi-protocol';
import { ControllableId, MonitorLevel, ToggleValues } from './toggle-state';

/** Normalized input event from the foot controller */
export interface InputEvent {
  /** CC number or note number */
  sourceCode: number;
  /** 0-127 */
  value: number;
  /** 0-indexed MIDI channel the event arrived on */
  channel?: number;
  kind?: 'cc' | 'note';
  /** Clock time the event came off the wire; debounce measures from here */
  receivedAt?: number;
}

/**
 * press: fire when value > threshold (switch goes down).
 * release: fire when value <= threshold (switch comes up).
 */
export type TriggerPolarity = 'press' | 'release';

export interface ButtonMapping {
  code: number;
  controllable: ControllableId;
  polarity: TriggerPolarity;
  threshold: number;
  label?: string;
}

export interface SceneGroups {
  mute: readonly number[];
  unmute: readonly number[];
}

export interface Behaviors {
  /** Key name in addresses.keys */
  recording: { key: string };
  /** Level reference in addresses.levels and the value for each state */
  monitorLevel: { channel: string; levels: Record<MonitorLevel, number> };
  fxMute: { group: number };
  breakMode: { active: SceneGroups; inactive: SceneGroups };
}

export interface DispatcherConfig {
  buttons: readonly ButtonMapping[];
  behaviors: Behaviors;
  /** Repeat presses of one button inside this window are ignored. 0 disables. */
  debounceMs: number;
  build: BuildContext;
}

type ToggleValue = ToggleValues[ControllableId];

export type DispatchResult =
  | { status: 'unmapped'; sourceCode: number }
  | { status: 'ignored'; reason: 'polarity' | 'debounced'; controllable: ControllableId }
  | { status: 'sent'; controllable: ControllableId; value: ToggleValue; operation: LogicalOperation; frames: number }
  | { status: 'dropped'; controllable: ControllableId; value: ToggleValue; operation: LogicalOperation; error: SendError }
  | { status: 'failed'; controllable: ControllableId; error: Error };
