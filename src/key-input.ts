export const KeyModifier = {
  None: 0,
  Shift: 1,
  Control: 2,
  Alt: 4,
} as const;

export type KeyModifiers = number;

export const namedKeys = [
  "Back",
  "Tab",
  "Enter",
  "Escape",
  "Delete",
  "Left",
  "Up",
  "Right",
  "Down",
  "Home",
  "End",
  "PageUp",
  "PageDown",
  "Insert",
  "Help",
  "F1",
  "F2",
  "F3",
  "F4",
  "F5",
  "F6",
  "F7",
  "F8",
  "F9",
  "F10",
  "F11",
  "F12",
  "Keypad0",
  "Keypad1",
  "Keypad2",
  "Keypad3",
  "Keypad4",
  "Keypad5",
  "Keypad6",
  "Keypad7",
  "Keypad8",
  "Keypad9",
  "KeypadDecimal",
  "KeypadEnter",
  "KeypadDivide",
  "KeypadMultiply",
  "KeypadMinus",
  "KeypadPlus",
] as const;

export type NamedKey = (typeof namedKeys)[number];

export type VirtualKey = "RawCharacter" | NamedKey;

export interface KeyEvent {
  readonly key: VirtualKey;
  readonly modifiers: KeyModifiers;
  readonly char: string | null;
}

const namedKeyChars: Partial<Record<NamedKey, string>> = {
  Back: "\b",
  Tab: "\t",
  Enter: "\r",
  Escape: "\u001b",
  Keypad0: "0",
  Keypad1: "1",
  Keypad2: "2",
  Keypad3: "3",
  Keypad4: "4",
  Keypad5: "5",
  Keypad6: "6",
  Keypad7: "7",
  Keypad8: "8",
  Keypad9: "9",
  KeypadDecimal: ".",
  KeypadEnter: "\r",
  KeypadDivide: "/",
  KeypadMultiply: "*",
  KeypadMinus: "-",
  KeypadPlus: "+",
};

export const isKeypadKey = (key: VirtualKey): boolean =>
  key.startsWith("Keypad");

export const namedKeyToKeyEvent = (key: NamedKey): KeyEvent => ({
  key,
  modifiers: KeyModifier.None,
  char: namedKeyChars[key] ?? null,
});

export const charToKeyEvent = (char: string): KeyEvent => {
  switch (char) {
    case "\b":
      return namedKeyToKeyEvent("Back");
    case "\t":
      return namedKeyToKeyEvent("Tab");
    case "\r":
    case "\n":
      return namedKeyToKeyEvent("Enter");
    case "\u001b":
      return namedKeyToKeyEvent("Escape");
    default:
      return { key: "RawCharacter", modifiers: KeyModifier.None, char };
  }
};

export const applyModifiers = (
  keyEvent: KeyEvent,
  modifiers: KeyModifiers,
): KeyEvent => ({
  ...keyEvent,
  modifiers: keyEvent.modifiers | modifiers,
});

export const hasModifier = (
  keyEvent: KeyEvent,
  modifier: KeyModifiers,
): boolean => (keyEvent.modifiers & modifier) !== 0;

export const keyEventsEqual = (a: KeyEvent, b: KeyEvent): boolean =>
  a.key === b.key && a.modifiers === b.modifiers && a.char === b.char;

const isPrintable = (char: string): boolean =>
  char.length === 1 && char >= " " && char !== "\u007f";

export const isDirectInput = (keyEvent: KeyEvent): boolean => {
  if (hasModifier(keyEvent, KeyModifier.Control | KeyModifier.Alt)) {
    return false;
  }
  if (keyEvent.char === null) return false;
  switch (keyEvent.key) {
    case "Enter":
    case "KeypadEnter":
    case "Tab":
      return true;
    case "RawCharacter":
      return isPrintable(keyEvent.char);
    default:
      return isKeypadKey(keyEvent.key) && isPrintable(keyEvent.char);
  }
};

export const allKeyEvents = (): KeyEvent[] => {
  const keys: KeyEvent[] = [];
  for (let code = 0x20; code < 0x7f; code += 1) {
    keys.push(charToKeyEvent(String.fromCharCode(code)));
  }
  for (const key of namedKeys) {
    keys.push(namedKeyToKeyEvent(key));
  }
  return keys;
};
