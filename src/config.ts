import { z } from "zod";
import type { Result } from "./result";
import { Err, Ok } from "./result";

export const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const editorOptionsSchema = z.object({
  tabStop: z.number().int().min(1).max(32).default(4),
  expandTab: z.boolean().default(true),
  maxMacroDepth: z.number().int().min(1).default(100),
  logLevel: logLevelSchema.default("warn"),
});

export type EditorOptions = z.infer<typeof editorOptionsSchema>;
export type EditorOptionsInput = z.input<typeof editorOptionsSchema>;

export const defaultEditorOptions: EditorOptions = editorOptionsSchema.parse(
  {},
);

export function parseEditorOptions(
  input: unknown,
): Result<EditorOptions, string[]> {
  const result = editorOptionsSchema.safeParse(input ?? {});
  if (result.success) {
    return Ok(result.data);
  }
  return Err(
    result.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return `${path ? `${path}: ` : ""}${issue.message}`;
    }),
  );
}
