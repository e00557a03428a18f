import { Type } from "@sinclair/typebox";
import type { TriageEngine } from "../services/triage-engine.js";
import type { SymptomTriagePluginApi } from "../types/plugin-api.js";
import { errorResult, jsonResult, toTrimmedString, type TriageTool } from "./tool-result.js";
import { withAssessmentStore } from "./with-store.js";

export function createTriageAssessTool(
  api: SymptomTriagePluginApi,
  options: { engine: TriageEngine },
): TriageTool {
  return {
    name: "triage_assess",
    description:
      "Classify free-text symptoms into a triage severity with a recommendation, optionally recording it for a patient.",
    parameters: Type.Object({
      symptoms_text: Type.String({ minLength: 1 }),
      patient_id: Type.Optional(Type.String({ minLength: 1 })),
    }),
    async execute(_toolCallId, rawParams) {
      const symptomsText = toTrimmedString(rawParams.symptoms_text);
      if (!symptomsText) {
        return errorResult("invalid_input", "symptoms_text is required.");
      }

      const assessment = await options.engine.assess(symptomsText);
      const patientId = toTrimmedString(rawParams.patient_id);
      if (!patientId) {
        return jsonResult({ status: "ok", data: { assessment, record: null }, errors: [] });
      }

      const record = withAssessmentStore(api, (store) =>
        store.create({ patient_id: patientId, symptoms: symptomsText, assessment }),
      );
      api.logger.info?.(
        `[symptom-triage] recorded ${assessment.severity} assessment ${record.id} for patient ${patientId}`,
      );
      return jsonResult({ status: "ok", data: { assessment, record }, errors: [] });
    },
  };
}
