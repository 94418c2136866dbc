/**
 * Two-mode encoding of command payloads into injection steps
 *
 * Interpreted mode lets tmux read key names (so `Enter` submits the line).
 * Literal mode sends every character as data and needs an explicit submit.
 * Both are pure so the contract can be checked without a terminal.
 */

import type { CommandPayload, InjectionStep } from '../types/pane.types.js';
import { findControlByte } from '@utils/sanitize';

const SUBMIT_KEY = 'Enter';

const NAMED_KEYS = new Set<string>([
  'enter', 'escape', 'tab', 'btab', 'bspace', 'space', 'any',
  'up', 'down', 'left', 'right', 'home', 'end',
  'ic', 'dc', 'insert', 'delete',
  'pageup', 'pgup', 'pagedown', 'pgdn', 'npage', 'ppage',
  'kp/', 'kp*', 'kp-', 'kp+', 'kp.', 'kpenter',
  'kp0', 'kp1', 'kp2', 'kp3', 'kp4', 'kp5', 'kp6', 'kp7', 'kp8', 'kp9',
  'focusin', 'focusout', 'pastestart', 'pasteend',
  ...Array.from({ length: 20 }, (_, i) => `f${i + 1}`),
]);

/** Unicode code points (U+263A) and user-defined keys (User0) */
const CODEPOINT_KEY = /^(u\+[0-9a-f]+|user\d+)$/i;

/** Mouse events, optionally bound to a screen location (WheelUpPane, MouseDown1Status) */
const MOUSE_KEY =
  /^(mouse(down|up|drag|dragend)[1-3]?|wheel(up|down)|(double|triple|second)click[1-3]|mousemove)(pane|status|statusleft|statusright|statusdefault|border|scrollbarup|scrollbarslider|scrollbardown)?$/i;

/**
 * True when tmux send-keys (without -l) would read the whole argument as a
 * key rather than as text: named keys, modifier chords, hex and Unicode key
 * codes, user keys and mouse events.
 */
export function isReservedKeyToken(arg: string): boolean {
  if (/^0x[0-9a-f]+$/i.test(arg) || CODEPOINT_KEY.test(arg)) {
    return true;
  }

  let rest = arg;
  let modified = false;
  while (/^[CMS]-./i.test(rest)) {
    rest = rest.slice(2);
    modified = true;
  }

  if (rest.length === 2 && rest.startsWith('^')) {
    return true;
  }
  if (NAMED_KEYS.has(rest.toLowerCase()) || CODEPOINT_KEY.test(rest) || MOUSE_KEY.test(rest)) {
    return true;
  }
  return modified && Array.from(rest).length === 1;
}

export type EncodeResult =
  | { valid: true; steps: InjectionStep[] }
  | { valid: false; error: string; offset: number };

function encodeLine(text: string, payload: CommandPayload): InjectionStep[] {
  if (payload.mode === 'literal') {
    return text.length === 0
      ? [{ kind: 'submit' }]
      : [{ kind: 'literal', text }, { kind: 'submit' }];
  }

  if (text.length === 0) {
    return [{ kind: 'keys', keys: [SUBMIT_KEY] }];
  }

  // Text that tmux would read as a key, or that spans lines, is quoted as data
  if (text.includes('\n') || isReservedKeyToken(text)) {
    return [{ kind: 'literal', text }, { kind: 'submit' }];
  }

  return [{ kind: 'keys', keys: [text, SUBMIT_KEY] }];
}

/**
 * Encode a payload into the ordered injection steps for one dispatch
 */
export function encodePayload(payload: CommandPayload): EncodeResult {
  const offset = findControlByte(payload.text);
  if (offset >= 0) {
    const code = payload.text.charCodeAt(offset).toString(16).padStart(2, '0');
    return {
      valid: false,
      error: `Payload contains control byte 0x${code} at offset ${offset}`,
      offset,
    };
  }

  if (payload.submission !== 'line-at-a-time') {
    return { valid: true, steps: encodeLine(payload.text, payload) };
  }

  const lines = payload.text.split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  return { valid: true, steps: lines.flatMap((line) => encodeLine(line, payload)) };
}

export type InputEvent =
  | { type: 'data'; text: string }
  | { type: 'key'; key: string }
  | { type: 'submit' };

/**
 * Decode steps into the input stream the target pane receives.
 * Adjacent data is merged.
 */
export function decodeSteps(steps: readonly InjectionStep[]): InputEvent[] {
  const events: InputEvent[] = [];

  const push = (event: InputEvent): void => {
    const last = events[events.length - 1];
    if (event.type === 'data' && last?.type === 'data') {
      last.text += event.text;
      return;
    }
    events.push(event);
  };

  for (const step of steps) {
    switch (step.kind) {
      case 'submit':
        push({ type: 'submit' });
        break;
      case 'literal':
        push({ type: 'data', text: step.text });
        break;
      case 'keys':
        for (const key of step.keys) {
          if (key.toLowerCase() === SUBMIT_KEY.toLowerCase()) {
            push({ type: 'submit' });
          } else if (isReservedKeyToken(key)) {
            push({ type: 'key', key });
          } else {
            push({ type: 'data', text: key });
          }
        }
        break;
    }
  }

  return events;
}
