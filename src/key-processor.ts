import type { KeyEvent, KeyModifiers, NamedKey } from "./key-input";
import {
  KeyModifier,
  applyModifiers,
  charToKeyEvent,
  namedKeyToKeyEvent,
} from "./key-input";
import type { DispatchResult } from "./types";

export interface KeyDown {
  key: string;
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey?: boolean;
}

export interface KeyProcessorTarget {
  canProcess(key: KeyEvent): boolean;
  processKey(key: KeyEvent): DispatchResult;
}

const pureModifiers = new Set(["Shift", "Control", "Alt", "Meta", "AltGraph"]);

const hostKeyNames = new Map<string, NamedKey>([
  ["Backspace", "Back"],
  ["Tab", "Tab"],
  ["Enter", "Enter"],
  ["Escape", "Escape"],
  ["Delete", "Delete"],
  ["ArrowLeft", "Left"],
  ["ArrowUp", "Up"],
  ["ArrowRight", "Right"],
  ["ArrowDown", "Down"],
  ["Home", "Home"],
  ["End", "End"],
  ["PageUp", "PageUp"],
  ["PageDown", "PageDown"],
  ["Insert", "Insert"],
  ["Help", "Help"],
  ["F1", "F1"],
  ["F2", "F2"],
  ["F3", "F3"],
  ["F4", "F4"],
  ["F5", "F5"],
  ["F6", "F6"],
  ["F7", "F7"],
  ["F8", "F8"],
  ["F9", "F9"],
  ["F10", "F10"],
  ["F11", "F11"],
  ["F12", "F12"],
]);

const modifiersOf = (event: KeyDown, withShift: boolean): KeyModifiers => {
  let modifiers: KeyModifiers = KeyModifier.None;
  if (withShift && event.shiftKey) modifiers |= KeyModifier.Shift;
  if (event.ctrlKey) modifiers |= KeyModifier.Control;
  if (event.altKey) modifiers |= KeyModifier.Alt;
  return modifiers;
};

/**
 * Translate a key-down into the editor's key. Returns null for keys the
 * editor never takes: modifier-only presses, AltGr characters and unknown
 * key names.
 */
export const translateKeyDown = (event: KeyDown): KeyEvent | null => {
  if (pureModifiers.has(event.key)) return null;

  if (event.key.length === 1) {
    // Ctrl+Alt on a character is AltGr; the host composes the text.
    if (event.ctrlKey && event.altKey) return null;
    return applyModifiers(charToKeyEvent(event.key), modifiersOf(event, false));
  }

  const named = hostKeyNames.get(event.key);
  if (named === undefined) return null;
  return applyModifiers(namedKeyToKeyEvent(named), modifiersOf(event, true));
};

export const processKeyDown = (
  target: KeyProcessorTarget,
  event: KeyDown,
): boolean => {
  const key = translateKeyDown(event);
  if (key === null) return false;
  if (!target.canProcess(key)) return false;
  return target.processKey(key).status !== "not-handled";
};
