import { Type } from "@sinclair/typebox";
import type { SymptomTriagePluginApi } from "../types/plugin-api.js";
import { jsonResult, type TriageTool } from "./tool-result.js";
import { withAssessmentStore } from "./with-store.js";

export function createTriageStatsTool(api: SymptomTriagePluginApi): TriageTool {
  return {
    name: "triage_stats",
    description: "Summarize stored triage assessments by review state and severity.",
    parameters: Type.Object({}),
    async execute() {
      const stats = withAssessmentStore(api, (store) => store.stats());
      return jsonResult({ status: "ok", data: stats, errors: [] });
    },
  };
}
