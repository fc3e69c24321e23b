import type { AppContext } from './context';
import { activeViewport, switchToDashboard, switchToHistory, switchToSession } from './context';

// Shape of the readline keypress event
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

export type KeyOutcome = 'quit' | 'redraw' | 'ignored';

function keyId(key: KeyPress): string | undefined {
  if (key.ctrl) {
    return key.name === 'c' ? 'ctrl+c' : undefined;
  }
  return key.name ?? key.sequence;
}

export function handleKey(ctx: AppContext, key: KeyPress): KeyOutcome {
  const id = keyId(key);

  switch (id) {
    case 'q':
    case 'ctrl+c':
      return 'quit';

    case 'd':
      switchToDashboard(ctx);
      return 'redraw';
    case 'h':
      switchToHistory(ctx);
      return 'redraw';
    case '1':
    case '2':
      return switchToSession(ctx, Number(id) - 1) ? 'redraw' : 'ignored';
  }

  const viewport = activeViewport(ctx);
  if (!viewport) return 'ignored';

  switch (id) {
    case '+':
    case '=':
      viewport.zoomIn();
      return 'redraw';
    case '-':
      viewport.zoomOut();
      return 'redraw';
    case 'left':
      viewport.panLeft();
      return 'redraw';
    case 'right':
      viewport.panRight();
      return 'redraw';
    case 'f':
      viewport.fitToData();
      return 'redraw';
    default:
      return 'ignored';
  }
}
