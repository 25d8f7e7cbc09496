import { NormalModeCommandResolver } from "./command-resolvers";
import { createInsertKeymap, insertTextCommand } from "./insert-keymap";
import { KeyMapper } from "./key-mapper";
import type { NormalModeActions } from "./normal-keymap";
import { createNormalKeymap } from "./normal-keymap";
import type { EditorState, NormalCommand } from "./types";
import type { UndoManager } from "./undo-manager";

export const createDefaultKeyMapper = <
  TState extends EditorState = EditorState,
>(
  undoManager: UndoManager<TState>,
  actions: NormalModeActions,
  options: {
    tabStop: number;
    expandTab: boolean;
    extendNormalCommands?: (
      commands: Map<string, NormalCommand<TState>>,
    ) => void;
  },
): KeyMapper<TState> => {
  const { motions, normalCommands } = createNormalKeymap<TState>(actions);
  options.extendNormalCommands?.(normalCommands);
  const normalResolver = new NormalModeCommandResolver<TState>(
    motions,
    normalCommands,
    undoManager,
    actions,
  );

  return new KeyMapper<TState>(
    normalResolver,
    createInsertKeymap<TState>(options),
    insertTextCommand,
  );
};
