/**
 * View state consumed by the renderer
 */

export type View =
  | { kind: 'dashboard' }
  | { kind: 'history' }
  | { kind: 'session'; index: number };

// Index window a chart viewport currently selects
export interface ViewportWindow {
  start: number;
  width: number;
  zoomLevel: number; // visible fraction of the bound data, 1 = everything
}
