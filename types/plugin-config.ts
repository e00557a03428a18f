import { z } from "zod";

export const DEFAULT_TRIAGE_DB_PATH = "~/.symptom-triage/triage.sqlite";

export const DEFAULT_TRIAGE_MODEL_SETTINGS = {
  confidenceThreshold: 0.6,
  maxFeatures: 1000,
  smoothing: 1,
} as const;

export const TRIAGE_ANNOTATOR_MODES = ["auto", "disabled"] as const;

export const TRIAGE_CLASSIFIER_BACKENDS = ["multinomial_nb", "disabled"] as const;

export const SymptomTriageConfigSchema = z.strictObject({
  dbPath: z.string().trim().min(1).default(DEFAULT_TRIAGE_DB_PATH),
  confidenceThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_TRIAGE_MODEL_SETTINGS.confidenceThreshold),
  maxFeatures: z.number().int().min(1).default(DEFAULT_TRIAGE_MODEL_SETTINGS.maxFeatures),
  smoothing: z.number().positive().finite().default(DEFAULT_TRIAGE_MODEL_SETTINGS.smoothing),
  annotator: z.enum(TRIAGE_ANNOTATOR_MODES).default("auto"),
  classifier: z.enum(TRIAGE_CLASSIFIER_BACKENDS).default("multinomial_nb"),
});

export type SymptomTriageConfig = z.infer<typeof SymptomTriageConfigSchema>;
