import type { Key } from 'ink';
import type { AppEvent, ViewMode } from '../types';

/** The flags of an ink `useInput` key the app looks at. */
export type KeyFlags = Partial<
  Pick<Key, 'upArrow' | 'downArrow' | 'leftArrow' | 'return' | 'escape' | 'backspace' | 'delete' | 'ctrl' | 'meta'>
>;

const KEY_BINDINGS: Record<string, AppEvent> = {
  j: { type: 'moveDown' },
  down: { type: 'moveDown' },
  k: { type: 'moveUp' },
  up: { type: 'moveUp' },
  return: { type: 'select' },
  escape: { type: 'back' },
  h: { type: 'back' },
  left: { type: 'back' },
  backspace: { type: 'back' },
  r: { type: 'refresh' },
  n: { type: 'loadMore' },
  t: { type: 'showTransitions' },
  space: { type: 'toggleSelection' },
  s: { type: 'startProgress' },
  x: { type: 'resolve' },
  a: { type: 'assignToMe' },
  c: { type: 'createTicket' },
  q: { type: 'quit' },
};

function keyName(input: string, key: KeyFlags): string {
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.return) return 'return';
  if (key.escape) return 'escape';
  // Most terminals send DEL for Backspace, which ink reports as `delete`.
  if (key.backspace || key.delete) return 'backspace';
  if (input === ' ') return 'space';
  return input;
}

/** Translates an ink `useInput` callback into an app event, or null when unbound. */
export function keyToEvent(input: string, key: KeyFlags): AppEvent | null {
  if (key.ctrl && input === 'c') {
    return { type: 'quit' };
  }
  if (key.ctrl || key.meta) {
    return null;
  }

  const name = keyName(input, key);
  if (!name) return null;

  return Object.hasOwn(KEY_BINDINGS, name) ? KEY_BINDINGS[name] : null;
}

export const KEY_HELP: Record<ViewMode, string> = {
  list: 'j/k move  enter open  space select  r refresh  n more  c create  q quit',
  detail: 't transitions  s start  x resolve  a assign to me  r reload  esc back  q quit',
  transitions: 'j/k move  enter apply  esc back  q quit',
  createTicket: 'esc back  q quit',
};
