import type { KeyEvent, KeyModifiers, NamedKey } from "./key-input";
import {
  KeyModifier,
  applyModifiers,
  charToKeyEvent,
  namedKeyToKeyEvent,
  namedKeys,
} from "./key-input";

const notationNames = new Map<string, NamedKey>([
  ["esc", "Escape"],
  ["escape", "Escape"],
  ["cr", "Enter"],
  ["enter", "Enter"],
  ["return", "Enter"],
  ["tab", "Tab"],
  ["bs", "Back"],
  ["backspace", "Back"],
  ["del", "Delete"],
  ["delete", "Delete"],
  ["left", "Left"],
  ["right", "Right"],
  ["up", "Up"],
  ["down", "Down"],
  ["home", "Home"],
  ["end", "End"],
  ["pageup", "PageUp"],
  ["pagedown", "PageDown"],
  ["insert", "Insert"],
  ["help", "Help"],
  ["kenter", "KeypadEnter"],
  ["kplus", "KeypadPlus"],
  ["kminus", "KeypadMinus"],
  ["kmultiply", "KeypadMultiply"],
  ["kdivide", "KeypadDivide"],
  ["kpoint", "KeypadDecimal"],
]);

const specialChars = new Map<string, string>([
  ["lt", "<"],
  ["space", " "],
  ["bar", "|"],
  ["bslash", "\\"],
]);

const formatNames: Partial<Record<NamedKey, string>> = {
  Escape: "Esc",
  Enter: "CR",
  Back: "BS",
  Delete: "Del",
  KeypadEnter: "kEnter",
  KeypadPlus: "kPlus",
  KeypadMinus: "kMinus",
  KeypadMultiply: "kMultiply",
  KeypadDivide: "kDivide",
  KeypadDecimal: "kPoint",
};

const namedKeysByLowerName = new Map<string, NamedKey>(
  namedKeys.map((key): [string, NamedKey] => [key.toLowerCase(), key]),
);

const lookupNamedKey = (name: string): NamedKey | null => {
  const lower = name.toLowerCase();
  const keypad = /^k([0-9])$/.exec(lower);
  return (
    notationNames.get(lower) ??
    namedKeysByLowerName.get(keypad ? `keypad${keypad[1]}` : lower) ??
    null
  );
};

const parseBracketed = (body: string): KeyEvent | null => {
  let modifiers: KeyModifiers = KeyModifier.None;
  let rest = body;
  for (;;) {
    const prefix = /^([CSAM])-(.+)$/i.exec(rest);
    if (!prefix) break;
    switch (prefix[1].toUpperCase()) {
      case "C":
        modifiers |= KeyModifier.Control;
        break;
      case "S":
        modifiers |= KeyModifier.Shift;
        break;
      default:
        modifiers |= KeyModifier.Alt;
        break;
    }
    rest = prefix[2];
  }

  if (rest.length === 1) {
    return applyModifiers(charToKeyEvent(rest), modifiers);
  }
  const special = specialChars.get(rest.toLowerCase());
  if (special !== undefined) {
    return applyModifiers(charToKeyEvent(special), modifiers);
  }
  const named = lookupNamedKey(rest);
  if (named === null) return null;
  return applyModifiers(namedKeyToKeyEvent(named), modifiers);
};

/**
 * Parse vi key notation such as `ihello<Esc>` or `<C-a>`. Bracketed text that
 * does not name a key is read as literal characters.
 */
export const parseKeyNotation = (text: string): KeyEvent[] => {
  const keys: KeyEvent[] = [];
  let index = 0;
  while (index < text.length) {
    const char = text[index];
    if (char === "<") {
      const close = text.indexOf(">", index + 1);
      if (close > index + 1) {
        const parsed = parseBracketed(text.slice(index + 1, close));
        if (parsed) {
          keys.push(parsed);
          index = close + 1;
          continue;
        }
      }
    }
    keys.push(charToKeyEvent(char));
    index += 1;
  }
  return keys;
};

const formatModifiers = (modifiers: KeyModifiers): string => {
  let prefix = "";
  if (modifiers & KeyModifier.Control) prefix += "C-";
  if (modifiers & KeyModifier.Shift) prefix += "S-";
  if (modifiers & KeyModifier.Alt) prefix += "A-";
  return prefix;
};

export const formatKeyEvent = (keyEvent: KeyEvent): string => {
  const prefix = formatModifiers(keyEvent.modifiers);
  if (keyEvent.key === "RawCharacter") {
    const char = keyEvent.char ?? "";
    const text = char === "<" ? "lt" : char === " " && prefix ? "Space" : char;
    if (prefix === "" && text === char) return char;
    return `<${prefix}${text}>`;
  }
  const name = formatNames[keyEvent.key] ?? keyEvent.key;
  return `<${prefix}${name}>`;
};

export const formatKeyNotation = (keys: readonly KeyEvent[]): string =>
  keys.map(formatKeyEvent).join("");
