import type { NormalModeCommandResolver } from "./command-resolvers";
import type { KeyEvent } from "./key-input";
import { isDirectInput } from "./key-input";
import type { Command, EditorState, ResolvedCommand } from "./types";
import { makeKey } from "./utils";

export class KeyMapper<TState extends EditorState> {
  constructor(
    private normalResolver: NormalModeCommandResolver<TState>,
    private insertKeymap: Map<string, Command<TState>>,
    private insertTextCommand: Command<TState>,
  ) {}

  public resolve(
    state: TState,
    keyEvent: KeyEvent,
  ): ResolvedCommand<TState> | null {
    if (state.mode === "normal") {
      return this.normalResolver.resolve(keyEvent);
    }

    const command = this.insertKeymap.get(makeKey(keyEvent));
    if (command) return { command };

    if (isDirectInput(keyEvent)) {
      return { command: this.insertTextCommand };
    }

    return null;
  }

  public canResolve(state: TState, keyEvent: KeyEvent): boolean {
    if (state.mode === "normal") {
      return this.normalResolver.canResolve(keyEvent);
    }
    return (
      this.insertKeymap.has(makeKey(keyEvent)) || isDirectInput(keyEvent)
    );
  }

  public isPending(state: TState): boolean {
    return state.mode === "normal" && this.normalResolver.isPending();
  }
}
