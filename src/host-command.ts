import type { KeyEvent, KeyModifiers, NamedKey } from "./key-input";
import {
  KeyModifier,
  applyModifiers,
  charToKeyEvent,
  hasModifier,
  isKeypadKey,
  namedKeyToKeyEvent,
} from "./key-input";
import type { Result } from "./result";
import { Err, Ok } from "./result";

export const CommandGroup = {
  Editor: "editor",
  Standard: "standard",
} as const;

export type CommandGroup = (typeof CommandGroup)[keyof typeof CommandGroup];

export const EditorCommandId = {
  TypeChar: 1,
  Backspace: 2,
  Return: 3,
  Tab: 4,
  BackTab: 5,
  Delete: 6,
  Left: 7,
  LeftExtend: 8,
  Right: 9,
  RightExtend: 10,
  Up: 11,
  UpExtend: 12,
  Down: 13,
  DownExtend: 14,
  // Document start/end. The Home and End keys arrive as LineStart/LineEnd.
  Home: 15,
  HomeExtend: 16,
  End: 17,
  EndExtend: 18,
  LineStart: 19,
  LineStartExtend: 20,
  LineEnd: 23,
  LineEndExtend: 24,
  PageUp: 27,
  PageUpExtend: 28,
  PageDown: 29,
  PageDownExtend: 30,
  Cancel: 103,
  ToggleOvertype: 122,
  LeftExtendColumn: 131,
  RightExtendColumn: 132,
  UpExtendColumn: 133,
  DownExtendColumn: 134,
  LineStartExtendColumn: 135,
  LineEndExtendColumn: 136,
} as const;

export const StandardCommandId = {
  Escape: 1,
  F1Help: 2,
} as const;

export type EditCommandKind = "user-input" | "host-command";

export interface EditCommand {
  keyEvent: KeyEvent;
  kind: EditCommandKind;
}

export interface HostCommandData {
  group: string;
  id: number;
  extraData: Uint8Array | null;
  modifiers: KeyModifiers;
}

export type ConversionFailure =
  | { type: "unknown_command"; group: string; id: number }
  | { type: "missing_payload"; group: string; id: number }
  | { type: "no_native_representation"; keyEvent: KeyEvent };

interface KeyDescription {
  key: NamedKey;
  modifiers: KeyModifiers;
  kind: EditCommandKind;
}

const tableKey = (group: string, id: number): string => `${group}:${id}`;

const userInput = (
  key: NamedKey,
  modifiers: KeyModifiers = KeyModifier.None,
): KeyDescription => ({ key, modifiers, kind: "user-input" });

const extendSelection = (key: NamedKey): KeyDescription => ({
  key,
  modifiers: KeyModifier.Shift,
  kind: "host-command",
});

const editor = (id: number): string => tableKey(CommandGroup.Editor, id);

// Several ids may decode to the same key; encoding picks one per key below.
const incoming = new Map<string, KeyDescription>([
  [editor(EditorCommandId.Backspace), userInput("Back")],
  [editor(EditorCommandId.Return), userInput("Enter")],
  [editor(EditorCommandId.Tab), userInput("Tab")],
  [editor(EditorCommandId.BackTab), userInput("Tab", KeyModifier.Shift)],
  [editor(EditorCommandId.Delete), userInput("Delete")],
  [editor(EditorCommandId.Left), userInput("Left")],
  [editor(EditorCommandId.Right), userInput("Right")],
  [editor(EditorCommandId.Up), userInput("Up")],
  [editor(EditorCommandId.Down), userInput("Down")],
  [editor(EditorCommandId.LineStart), userInput("Home")],
  [editor(EditorCommandId.LineEnd), userInput("End")],
  [editor(EditorCommandId.PageUp), userInput("PageUp")],
  [editor(EditorCommandId.PageDown), userInput("PageDown")],
  [editor(EditorCommandId.Cancel), userInput("Escape")],
  [editor(EditorCommandId.ToggleOvertype), userInput("Insert")],
  [editor(EditorCommandId.LeftExtend), extendSelection("Left")],
  [editor(EditorCommandId.LeftExtendColumn), extendSelection("Left")],
  [editor(EditorCommandId.RightExtend), extendSelection("Right")],
  [editor(EditorCommandId.RightExtendColumn), extendSelection("Right")],
  [editor(EditorCommandId.UpExtend), extendSelection("Up")],
  [editor(EditorCommandId.UpExtendColumn), extendSelection("Up")],
  [editor(EditorCommandId.DownExtend), extendSelection("Down")],
  [editor(EditorCommandId.DownExtendColumn), extendSelection("Down")],
  [editor(EditorCommandId.PageUpExtend), extendSelection("PageUp")],
  [editor(EditorCommandId.PageDownExtend), extendSelection("PageDown")],
  [editor(EditorCommandId.LineStartExtend), extendSelection("Home")],
  [editor(EditorCommandId.LineStartExtendColumn), extendSelection("Home")],
  [editor(EditorCommandId.LineEndExtend), extendSelection("End")],
  [editor(EditorCommandId.LineEndExtendColumn), extendSelection("End")],
  [tableKey(CommandGroup.Standard, StandardCommandId.Escape), userInput("Escape")],
  [tableKey(CommandGroup.Standard, StandardCommandId.F1Help), userInput("F1")],
]);

const outgoing = new Map<NamedKey, { group: CommandGroup; id: number }>([
  ["Back", { group: CommandGroup.Editor, id: EditorCommandId.Backspace }],
  ["Enter", { group: CommandGroup.Editor, id: EditorCommandId.Return }],
  ["KeypadEnter", { group: CommandGroup.Editor, id: EditorCommandId.Return }],
  ["Tab", { group: CommandGroup.Editor, id: EditorCommandId.Tab }],
  ["Delete", { group: CommandGroup.Editor, id: EditorCommandId.Delete }],
  ["Left", { group: CommandGroup.Editor, id: EditorCommandId.Left }],
  ["Right", { group: CommandGroup.Editor, id: EditorCommandId.Right }],
  ["Up", { group: CommandGroup.Editor, id: EditorCommandId.Up }],
  ["Down", { group: CommandGroup.Editor, id: EditorCommandId.Down }],
  ["Home", { group: CommandGroup.Editor, id: EditorCommandId.LineStart }],
  ["End", { group: CommandGroup.Editor, id: EditorCommandId.LineEnd }],
  ["PageUp", { group: CommandGroup.Editor, id: EditorCommandId.PageUp }],
  ["PageDown", { group: CommandGroup.Editor, id: EditorCommandId.PageDown }],
  ["Escape", { group: CommandGroup.Editor, id: EditorCommandId.Cancel }],
  ["Insert", { group: CommandGroup.Editor, id: EditorCommandId.ToggleOvertype }],
  ["F1", { group: CommandGroup.Standard, id: StandardCommandId.F1Help }],
]);

const extendOutgoing = new Map<NamedKey, number>([
  ["Left", EditorCommandId.LeftExtend],
  ["Right", EditorCommandId.RightExtend],
  ["Up", EditorCommandId.UpExtend],
  ["Down", EditorCommandId.DownExtend],
  ["PageUp", EditorCommandId.PageUpExtend],
  ["PageDown", EditorCommandId.PageDownExtend],
  ["Home", EditorCommandId.LineStartExtend],
  ["End", EditorCommandId.LineEndExtend],
]);

export const encodeCharPayload = (char: string): Uint8Array => {
  const code = char.charCodeAt(0);
  return new Uint8Array([code & 0xff, (code >> 8) & 0xff]);
};

export const decodeCharPayload = (
  extraData: Uint8Array | null,
): string | null => {
  if (extraData === null || extraData.length !== 2) return null;
  return String.fromCharCode(extraData[0] | (extraData[1] << 8));
};

/**
 * Translate a host command into a key. A failure means the host should run
 * the command natively.
 */
export const decodeHostCommand = (
  command: HostCommandData,
): Result<EditCommand, ConversionFailure> => {
  const { group, id, extraData, modifiers } = command;
  if (group === CommandGroup.Editor && id === EditorCommandId.TypeChar) {
    const char = decodeCharPayload(extraData);
    if (char === null) {
      return Err({ type: "missing_payload", group, id });
    }
    return Ok({
      keyEvent: applyModifiers(charToKeyEvent(char), modifiers),
      kind: "user-input",
    });
  }

  const description = incoming.get(tableKey(group, id));
  if (!description) {
    return Err({ type: "unknown_command", group, id });
  }
  return Ok({
    keyEvent: applyModifiers(
      namedKeyToKeyEvent(description.key),
      description.modifiers | modifiers,
    ),
    kind: description.kind,
  });
};

/**
 * Translate a key into the host command that produces it. With
 * `forTextInput` unset, shifted navigation keys become the host's
 * extend-selection commands.
 */
export const encodeKeyEvent = (
  keyEvent: KeyEvent,
  forTextInput: boolean,
): Result<HostCommandData, ConversionFailure> => {
  const { key, char } = keyEvent;
  if (key === "RawCharacter" || (isKeypadKey(key) && key !== "KeypadEnter")) {
    if (char === null) {
      return Err({ type: "no_native_representation", keyEvent });
    }
    return Ok({
      group: CommandGroup.Editor,
      id: EditorCommandId.TypeChar,
      extraData: encodeCharPayload(char),
      modifiers: keyEvent.modifiers,
    });
  }

  const withoutShift = keyEvent.modifiers & ~KeyModifier.Shift;
  if (hasModifier(keyEvent, KeyModifier.Shift)) {
    if (key === "Tab") {
      return Ok({
        group: CommandGroup.Editor,
        id: EditorCommandId.BackTab,
        extraData: null,
        modifiers: withoutShift,
      });
    }
    const extendId = forTextInput ? undefined : extendOutgoing.get(key);
    if (extendId !== undefined) {
      return Ok({
        group: CommandGroup.Editor,
        id: extendId,
        extraData: null,
        modifiers: withoutShift,
      });
    }
  }

  const target = outgoing.get(key);
  if (!target) {
    return Err({ type: "no_native_representation", keyEvent });
  }
  return Ok({
    group: target.group,
    id: target.id,
    extraData: null,
    modifiers: keyEvent.modifiers,
  });
};
