import { ZodError } from "zod";
import { ImpactAnalysisError, errorMessage } from "@regimpact/engine";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

export function wrapResponse(data: unknown): ToolResult {
  return { content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }] };
}

function errorCode(err: unknown): string {
  if (err instanceof ImpactAnalysisError) return err.code;
  if (err instanceof ZodError) return "INVALID_INPUT";
  return "INTERNAL";
}

export function errorResponse(err: unknown): ToolResult {
  const message = err instanceof ZodError
    ? err.issues.map(i => `${i.path.join(".") || "input"}: ${i.message}`).join("; ")
    : errorMessage(err);
  return {
    content: [{ type: "text" as const, text: JSON.stringify({ error: message, code: errorCode(err) }) }],
    isError: true,
  };
}
