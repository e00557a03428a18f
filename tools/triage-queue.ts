import { Type } from "@sinclair/typebox";
import { MAX_LIST_LIMIT } from "../services/assessment-store.js";
import type { SymptomTriagePluginApi } from "../types/plugin-api.js";
import { jsonResult, toTrimmedString, type TriageTool } from "./tool-result.js";
import { withAssessmentStore } from "./with-store.js";

export function createTriageQueueTool(api: SymptomTriagePluginApi): TriageTool {
  return {
    name: "triage_queue",
    description: "List stored triage assessments awaiting review (or recently reviewed), newest first.",
    parameters: Type.Object({
      patient_id: Type.Optional(Type.String({ minLength: 1 })),
      reviewed: Type.Optional(Type.Boolean()),
      limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LIST_LIMIT })),
    }),
    async execute(_toolCallId, rawParams) {
      const patientId = toTrimmedString(rawParams.patient_id);
      const reviewed = rawParams.reviewed === true;

      const assessments = withAssessmentStore(api, (store) =>
        store.list({
          patient_id: patientId || undefined,
          reviewed,
          limit: typeof rawParams.limit === "number" ? rawParams.limit : undefined,
        }),
      );
      return jsonResult({
        status: "ok",
        data: { reviewed, assessments },
        errors: [],
      });
    },
  };
}
