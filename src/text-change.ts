export type InsertChange = { type: "insert"; text: string };
export type DeleteLeftChange = { type: "delete-left"; count: number };
export type DeleteRightChange = { type: "delete-right"; count: number };
export type CombinationChange = {
  type: "combination";
  first: TextChange;
  second: TextChange;
};

export type TextChange =
  | InsertChange
  | DeleteLeftChange
  | DeleteRightChange
  | CombinationChange;

export const makeInsert = (text: string): InsertChange => ({
  type: "insert",
  text,
});

export const makeDeleteLeft = (count: number): DeleteLeftChange => ({
  type: "delete-left",
  count,
});

export const makeDeleteRight = (count: number): DeleteRightChange => ({
  type: "delete-right",
  count,
});

export const isEmptyChange = (change: TextChange): boolean => {
  switch (change.type) {
    case "insert":
      return change.text === "";
    case "delete-left":
    case "delete-right":
      return change.count === 0;
    case "combination":
      return false;
  }
};

export const makeCombination = (
  first: TextChange,
  second: TextChange,
): TextChange => {
  if (isEmptyChange(second)) return first;
  if (isEmptyChange(first)) return second;
  return { type: "combination", first, second };
};

export const isInsert = (
  change: TextChange,
  text?: string,
): change is InsertChange =>
  change.type === "insert" && (text === undefined || change.text === text);

export const isDeleteLeft = (
  change: TextChange,
  count?: number,
): change is DeleteLeftChange =>
  change.type === "delete-left" &&
  (count === undefined || change.count === count);

export const isDeleteRight = (
  change: TextChange,
  count?: number,
): change is DeleteRightChange =>
  change.type === "delete-right" &&
  (count === undefined || change.count === count);

export const isCombination = (
  change: TextChange,
): change is CombinationChange => change.type === "combination";

export const textChangesEqual = (a: TextChange, b: TextChange): boolean => {
  switch (a.type) {
    case "insert":
      return b.type === "insert" && a.text === b.text;
    case "delete-left":
      return b.type === "delete-left" && a.count === b.count;
    case "delete-right":
      return b.type === "delete-right" && a.count === b.count;
    case "combination":
      return (
        b.type === "combination" &&
        textChangesEqual(a.first, b.first) &&
        textChangesEqual(a.second, b.second)
      );
  }
};

/**
 * Fold `next` into `previous` when the pair reduces to a single change.
 * Returns null when the two can only be combined.
 */
export const reduceTextChanges = (
  previous: TextChange,
  next: TextChange,
): TextChange | null => {
  switch (previous.type) {
    case "insert":
      if (next.type === "insert") {
        return makeInsert(previous.text + next.text);
      }
      if (next.type === "delete-left") {
        const kept = previous.text.length - next.count;
        return kept >= 0
          ? makeInsert(previous.text.slice(0, kept))
          : makeDeleteLeft(-kept);
      }
      return null;
    case "delete-left":
      return next.type === "delete-left"
        ? makeDeleteLeft(previous.count + next.count)
        : null;
    case "delete-right":
      return next.type === "delete-right"
        ? makeDeleteRight(previous.count + next.count)
        : null;
    case "combination": {
      const reduced = reduceTextChanges(previous.second, next);
      return reduced === null ? null : makeCombination(previous.first, reduced);
    }
  }
};

export const mergeTextChanges = (
  previous: TextChange,
  next: TextChange,
): TextChange => {
  if (isEmptyChange(next)) return previous;
  return reduceTextChanges(previous, next) ?? makeCombination(previous, next);
};

export const describeTextChange = (change: TextChange): string => {
  switch (change.type) {
    case "insert":
      return `Insert(${JSON.stringify(change.text)})`;
    case "delete-left":
      return `DeleteLeft(${change.count})`;
    case "delete-right":
      return `DeleteRight(${change.count})`;
    case "combination":
      return `Combination(${describeTextChange(change.first)}, ${describeTextChange(change.second)})`;
  }
};
