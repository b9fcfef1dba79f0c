import type { z } from "zod";

export interface ToolSpec<Schema extends z.ZodTypeAny> {
  name: string;
  /** Free text the model reads to decide when the tool is useful. */
  description: string;
  schema: Schema;
  /** JSON schema advertised to the model; `schema` is what actually validates. */
  inputSchema: Record<string, unknown>;
  call: (input: z.infer<Schema>) => Promise<string>;
}

export type ToolParseResult =
  | { success: true; run: () => Promise<string> }
  | { success: false; issues: string[] };

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
  prepare(input: unknown): ToolParseResult;
}

export function defineTool<Schema extends z.ZodTypeAny>(spec: ToolSpec<Schema>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    prepare(input) {
      const parsed = spec.schema.safeParse(input);
      if (!parsed.success) {
        return {
          success: false,
          issues: parsed.error.issues.map((issue) =>
            issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
          ),
        };
      }
      const value: z.infer<Schema> = parsed.data;
      return { success: true, run: () => spec.call(value) };
    },
  };
}
