import type { TriageTool } from "../tools/tool-result.js";

export type TriageLogger = {
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

export type SymptomTriagePluginApi = {
  pluginConfig?: unknown;
  logger: TriageLogger;
  // Called once per tool when present; the tools are returned either way.
  registerTool?: (tool: TriageTool) => void;
};

export type PluginConfigUiHint = {
  label?: string;
  help?: string;
  placeholder?: string;
  advanced?: boolean;
};
