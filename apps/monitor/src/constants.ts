export const SAMPLE_INTERVAL_MS = 5000; // 5 seconds
export const AUTOSAVE_EVERY_SAMPLES = 60; // ~5 min at 5s interval
export const MAX_SAMPLES = 40_000; // ~55h at 5s interval
export const MAX_COMPLETED_SESSIONS = 2;
export const SESSION_COMPLETE_PERCENT = 90;

// Chart viewport
export const ZOOM_FACTOR = 0.7;
export const PAN_FRACTION = 0.2;
export const MIN_VISIBLE_POINTS = 10;

export const HISTORY_FILE_NAME = 'history.json';
