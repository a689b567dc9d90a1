import { DispatcherConfig } from '../../dispatcher/types';
import { AddressTable } from '../../midi-protocol';

export const TEST_ADDRESSES: AddressTable = {
  levels: { aux_send: { msb: 0x40, lsb: 0x44 } },
  muteGroups: {
    '1': { msb: 0x04, lsb: 0x00 },
    '2': { msb: 0x04, lsb: 0x01 },
    '3': { msb: 0x04, lsb: 0x02 },
    '4': { msb: 0x04, lsb: 0x03 },
  },
  keys: { recording: 0x30 },
};

export function testDispatcherConfig(overrides: Partial<DispatcherConfig> = {}): DispatcherConfig {
  return {
    buttons: [
      { code: 20, controllable: 'recording', polarity: 'press', threshold: 0 },
      { code: 21, controllable: 'monitor_level', polarity: 'press', threshold: 0 },
      { code: 22, controllable: 'fx_mute', polarity: 'press', threshold: 0 },
      { code: 23, controllable: 'break_mode', polarity: 'press', threshold: 0 },
    ],
    behaviors: {
      recording: { key: 'recording' },
      monitorLevel: { channel: 'aux_send', levels: { low: 64, high: 100 } },
      fxMute: { group: 1 },
      breakMode: {
        active: { mute: [1, 2, 4], unmute: [3] },
        inactive: { mute: [3], unmute: [1, 2, 4] },
      },
    },
    debounceMs: 100,
    build: {
      addresses: TEST_ADDRESSES,
      midiChannel: 0,
      pulseGapMs: 50,
      muteValues: { on: 127, off: 0 },
    },
    ...overrides,
  };
}

/** The four frames of one mute-group parameter change on channel 1 */
export function groupFrames(group: number, value: number): number[][] {
  return [
    [0xb0, 0x63, 0x04],
    [0xb0, 0x62, group - 1],
    [0xb0, 0x06, 0x00],
    [0xb0, 0x26, value],
  ];
}
