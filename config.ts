import type { ZodIssue } from "zod";
import type { PluginConfigUiHint } from "./types/plugin-api.js";
import {
  type SymptomTriageConfig,
  SymptomTriageConfigSchema,
  DEFAULT_TRIAGE_DB_PATH,
  DEFAULT_TRIAGE_MODEL_SETTINGS,
  TRIAGE_CLASSIFIER_BACKENDS,
} from "./types/plugin-config.js";

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function parseSymptomTriageConfig(value: unknown): SymptomTriageConfig {
  const result = SymptomTriageConfigSchema.safeParse(value ?? {});
  if (result.success) {
    return result.data;
  }
  throw new Error(`Invalid symptom triage plugin config: ${formatIssues(result.error.issues)}`);
}

export const symptomTriageConfigSchema = {
  parse: parseSymptomTriageConfig,
  uiHints: {
    dbPath: {
      label: "Triage DB Path",
      placeholder: DEFAULT_TRIAGE_DB_PATH,
      help: "SQLite path for stored triage assessments and their review state.",
      advanced: true,
    },
    confidenceThreshold: {
      label: "Confidence Threshold",
      placeholder: String(DEFAULT_TRIAGE_MODEL_SETTINGS.confidenceThreshold),
      help: "Assessments below this confidence carry a professional-verification disclaimer.",
    },
    maxFeatures: {
      label: "Vocabulary Size",
      placeholder: String(DEFAULT_TRIAGE_MODEL_SETTINGS.maxFeatures),
      help: "Maximum number of TF-IDF terms kept from the training corpus.",
      advanced: true,
    },
    smoothing: {
      label: "Likelihood Smoothing",
      placeholder: String(DEFAULT_TRIAGE_MODEL_SETTINGS.smoothing),
      advanced: true,
    },
    annotator: {
      label: "Linguistic Annotator",
      help: "auto uses tokenization, stopword removal and stemming when available.",
    },
    classifier: {
      label: "Classifier Backend",
      help: `Allowed values: ${TRIAGE_CLASSIFIER_BACKENDS.join(", ")}. disabled keeps the engine in fallback mode.`,
      advanced: true,
    },
  } satisfies Record<string, PluginConfigUiHint>,
};

export type { SymptomTriageConfig };
