import type { TSchema } from "@sinclair/typebox";

export type TriageToolError = {
  code: string;
  message: string;
};

export type TriageToolPayload = {
  status: "ok" | "error";
  data: unknown;
  errors: TriageToolError[];
};

export type TriageToolResult = {
  content: Array<{ type: "text"; text: string }>;
  details: TriageToolPayload;
};

export type TriageTool = {
  name: string;
  description: string;
  parameters: TSchema;
  execute: (toolCallId: string, rawParams: Record<string, unknown>) => Promise<TriageToolResult>;
};

export function jsonResult(payload: TriageToolPayload): TriageToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}

export function errorResult(code: string, message: string): TriageToolResult {
  return jsonResult({ status: "error", data: null, errors: [{ code, message }] });
}

export function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}
