import { expect, test } from "vitest";
import {
  createBlankNormalizer,
  describeTextChange,
  isCombination,
  isDeleteLeft,
  isDeleteRight,
  isInsert,
  makeCombination,
  makeDeleteLeft,
  makeDeleteRight,
  makeInsert,
  mergeTextChanges,
  textChangesEqual,
} from "../src";
import type { TextChange } from "../src";

test("inserts concatenate", () => {
  const merged = [makeInsert("b"), makeInsert("c")].reduce<TextChange>(
    mergeTextChanges,
    makeInsert("a"),
  );
  expect(merged).toEqual(makeInsert("abc"));
});

test("delete left trims the inserted text", () => {
  expect(mergeTextChanges(makeInsert("abc"), makeDeleteLeft(1))).toEqual(
    makeInsert("ab"),
  );
  expect(mergeTextChanges(makeInsert("abc"), makeDeleteLeft(3))).toEqual(
    makeInsert(""),
  );
});

test("deleting past the insert leaves the overshoot", () => {
  expect(mergeTextChanges(makeInsert("ab"), makeDeleteLeft(5))).toEqual(
    makeDeleteLeft(3),
  );
});

test("deletes of one direction sum", () => {
  expect(mergeTextChanges(makeDeleteLeft(2), makeDeleteLeft(3))).toEqual(
    makeDeleteLeft(5),
  );
  expect(mergeTextChanges(makeDeleteRight(1), makeDeleteRight(1))).toEqual(
    makeDeleteRight(2),
  );
});

test("unrelated changes combine", () => {
  const merged = mergeTextChanges(makeDeleteLeft(2), makeInsert("x"));
  expect(isCombination(merged)).toBe(true);
  expect(describeTextChange(merged)).toBe('Combination(DeleteLeft(2), Insert("x"))');
});

test("a combination absorbs a change its second part merges with", () => {
  const replace = makeCombination(makeDeleteLeft(3), makeInsert("do"));
  const merged = mergeTextChanges(replace, makeInsert("g"));
  expect(merged).toEqual(makeCombination(makeDeleteLeft(3), makeInsert("dog")));
});

test("combinations chain", () => {
  const merged = [makeInsert("x"), makeDeleteRight(1)].reduce<TextChange>(
    mergeTextChanges,
    makeDeleteRight(2),
  );
  expect(describeTextChange(merged)).toBe(
    'Combination(Combination(DeleteRight(2), Insert("x")), DeleteRight(1))',
  );
});

test("empty sides are dropped from combinations", () => {
  expect(makeCombination(makeInsert(""), makeDeleteLeft(1))).toEqual(
    makeDeleteLeft(1),
  );
  expect(makeCombination(makeDeleteRight(2), makeDeleteLeft(0))).toEqual(
    makeDeleteRight(2),
  );
  expect(mergeTextChanges(makeInsert("a"), makeInsert(""))).toEqual(
    makeInsert("a"),
  );
});

test("predicates match kind and value", () => {
  expect(isInsert(makeInsert("dog"), "dog")).toBe(true);
  expect(isInsert(makeInsert("dog"), "cat")).toBe(false);
  expect(isDeleteLeft(makeDeleteLeft(3), 3)).toBe(true);
  expect(isDeleteLeft(makeDeleteRight(3))).toBe(false);
  expect(isDeleteRight(makeDeleteRight(3))).toBe(true);
});

test("equality is structural", () => {
  const a = makeCombination(makeDeleteLeft(3), makeInsert("cat"));
  const b = makeCombination(makeDeleteLeft(3), makeInsert("cat"));
  const c = makeCombination(makeDeleteLeft(3), makeInsert("cab"));
  expect(textChangesEqual(a, b)).toBe(true);
  expect(textChangesEqual(a, c)).toBe(false);
  expect(textChangesEqual(makeDeleteLeft(1), makeDeleteRight(1))).toBe(false);
});

test("blank normalization", () => {
  const toTabs = createBlankNormalizer({ tabStop: 4, expandTab: false });
  const toSpaces = createBlankNormalizer({ tabStop: 2, expandTab: true });
  expect(toTabs("        x")).toBe("\t\tx");
  expect(toTabs("\t  x")).toBe("\t  x");
  expect(toSpaces("\tx")).toBe("  x");
  for (const text of ["     a", "\t \tb", "  \t  "]) {
    expect(toTabs(toTabs(text))).toBe(toTabs(text));
    expect(toSpaces(toSpaces(text))).toBe(toSpaces(text));
  }
});
