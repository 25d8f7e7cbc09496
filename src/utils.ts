import type { KeyEvent } from "./key-input";
import { KeyModifier, hasModifier } from "./key-input";

export const clampNumber = (
  value: number,
  min: number,
  max: number,
): number => {
  return Math.min(Math.max(value, min), max);
};

export const makeKey = (keyEvent: KeyEvent): string => {
  const modifiers: string[] = [];
  if (hasModifier(keyEvent, KeyModifier.Control)) modifiers.push("Ctrl");
  if (hasModifier(keyEvent, KeyModifier.Alt)) modifiers.push("Alt");
  if (keyEvent.key === "RawCharacter") {
    modifiers.push(keyEvent.char ?? "");
  } else {
    if (hasModifier(keyEvent, KeyModifier.Shift)) modifiers.push("Shift");
    modifiers.push(keyEvent.key);
  }
  return modifiers.join("+");
};

const expandTabs = (text: string, tabStop: number): string =>
  text.replace(/\t/g, " ".repeat(tabStop));

/**
 * Blank normalization used to recognise replace edits that only re-indent.
 * Tabs become spaces when `expandTab` is set, otherwise every run of
 * `tabStop` spaces becomes a tab.
 */
export const createBlankNormalizer = ({
  tabStop,
  expandTab,
}: {
  tabStop: number;
  expandTab: boolean;
}): ((text: string) => string) => {
  const spaceRun = new RegExp(` {${tabStop}}`, "g");
  return (text) => {
    const expanded = expandTabs(text, tabStop);
    return expandTab ? expanded : expanded.replace(spaceRun, "\t");
  };
};
