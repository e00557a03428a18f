import { Type } from "@sinclair/typebox";
import { SEVERITY_CLASSES, isSeverityClass } from "../types/triage.js";
import type { SymptomTriagePluginApi } from "../types/plugin-api.js";
import { errorResult, jsonResult, toTrimmedString, type TriageTool } from "./tool-result.js";
import { withAssessmentStore } from "./with-store.js";

export function createTriageReviewTool(api: SymptomTriagePluginApi): TriageTool {
  return {
    name: "triage_review",
    description: "Record a staff review of a stored triage assessment, overriding severity and recommendation.",
    parameters: Type.Object({
      assessment_id: Type.String({ minLength: 1 }),
      severity: Type.Union(SEVERITY_CLASSES.map((value) => Type.Literal(value))),
      recommendation: Type.String({ minLength: 1 }),
      is_reviewed: Type.Optional(Type.Boolean()),
      staff_id: Type.Optional(Type.String({ minLength: 1 })),
    }),
    async execute(_toolCallId, rawParams) {
      const assessmentId = toTrimmedString(rawParams.assessment_id);
      if (!assessmentId) {
        return errorResult("invalid_input", "assessment_id is required.");
      }
      const severity = rawParams.severity;
      if (!isSeverityClass(severity)) {
        return errorResult("invalid_input", `severity must be one of ${SEVERITY_CLASSES.join(", ")}.`);
      }
      const recommendation = toTrimmedString(rawParams.recommendation);
      if (!recommendation) {
        return errorResult("invalid_input", "recommendation is required.");
      }
      const isReviewed = typeof rawParams.is_reviewed === "boolean" ? rawParams.is_reviewed : true;
      const staffId = toTrimmedString(rawParams.staff_id) || null;

      const record = withAssessmentStore(api, (store) =>
        store.review(assessmentId, {
          severity,
          recommendation,
          is_reviewed: isReviewed,
          staff_id: staffId,
        }),
      );
      if (!record) {
        return errorResult("not_found", `No triage assessment with id ${assessmentId}.`);
      }
      return jsonResult({ status: "ok", data: record, errors: [] });
    },
  };
}
