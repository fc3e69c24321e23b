import type { BatterySample } from '@battrack/shared-types';

export type MonitorState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface MonitorOptions {
  sampleIntervalMs?: number;
}

export interface MonitorEvents {
  stateChange: (state: MonitorState) => void;
  sample: (sample: BatterySample) => void;
  unavailable: () => void;
  autosave: () => void;
  saved: (ok: boolean) => void;
}
