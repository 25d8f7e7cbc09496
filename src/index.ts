export * from "./types";
export * from "./result";
export * from "./errors";
export * from "./config";
export * from "./logger";
export * from "./key-input";
export * from "./key-notation";
export * from "./host-command";
export * from "./text-change";
export * from "./text-change-tracker";
export * from "./text-buffer";
export * from "./register-map";
export * from "./macro-engine";
export * from "./cursor-state";
export * from "./undo-manager";
export * from "./motions";
export * from "./normal-keymap";
export * from "./insert-keymap";
export * from "./command-resolvers";
export * from "./key-mapper";
export * from "./default-key-mapper";
export * from "./command-executor";
export * from "./controller";
export * from "./key-processor";
export { clampNumber, createBlankNormalizer, makeKey } from "./utils";
