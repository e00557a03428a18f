import { symptomTriageConfigSchema, parseSymptomTriageConfig } from "./config.js";
import { createTriageEngine, type TriageEngine } from "./services/triage-engine.js";
import { createTriageAssessTool } from "./tools/triage-assess.js";
import { createTriageQueueTool } from "./tools/triage-queue.js";
import { createTriageReviewTool } from "./tools/triage-review.js";
import { createTriageStatsTool } from "./tools/triage-stats.js";
import type { TriageTool } from "./tools/tool-result.js";
import type { SymptomTriagePluginApi, TriageLogger } from "./types/plugin-api.js";
import type { SymptomTriageConfig } from "./types/plugin-config.js";
import type { AssessmentResult } from "./types/triage.js";

export type SymptomTriagePlugin = {
  id: "symptom-triage";
  config: SymptomTriageConfig;
  engine: TriageEngine;
  tools: TriageTool[];
};

const consoleLogger: TriageLogger = {
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

let sharedEngine: TriageEngine | null = null;

export function createSymptomTriagePlugin(api: SymptomTriagePluginApi): SymptomTriagePlugin {
  const config = parseSymptomTriageConfig(api.pluginConfig);
  const engine = createTriageEngine({ config, logger: api.logger });
  const tools = [
    createTriageAssessTool(api, { engine }),
    createTriageReviewTool(api),
    createTriageQueueTool(api),
    createTriageStatsTool(api),
  ];
  if (api.registerTool) {
    for (const tool of tools) {
      api.registerTool(tool);
    }
  }
  api.logger.info?.(
    `[symptom-triage] registered tools ${tools.map((tool) => tool.name).join(", ")} (annotator=${config.annotator}, classifier=${config.classifier})`,
  );
  return { id: "symptom-triage", config, engine, tools };
}

/**
 * Severity assessment for free-text symptoms using a process-wide engine.
 * The promise always resolves; when the model is unavailable the severity is "Unknown".
 */
export function assessPatientSymptoms(symptomsText: string): Promise<AssessmentResult> {
  if (!sharedEngine) {
    sharedEngine = createTriageEngine({ logger: consoleLogger });
  }
  return sharedEngine.assess(symptomsText);
}

export { symptomTriageConfigSchema, parseSymptomTriageConfig };
export {
  ASSESSMENT_FAILED_RECOMMENDATION,
  MODEL_UNAVAILABLE_RECOMMENDATION,
  createTriageEngine,
  trainTriageModel,
} from "./services/triage-engine.js";
export type {
  DetailedAssessment,
  TriageEngine,
  TriageEngineState,
  TriageEngineStatus,
} from "./services/triage-engine.js";
export { LOW_CONFIDENCE_DISCLAIMER, recommend } from "./services/recommendation.js";
export { createTriageAssessmentStore } from "./services/assessment-store.js";
export type { TriageAssessmentRecord, TriageStats } from "./services/assessment-store.js";
export { closeTriageDb, openTriageDb } from "./services/db.js";
export { runTriageMigrations } from "./services/migrations.js";
export type { SymptomTriagePluginApi, TriageLogger } from "./types/plugin-api.js";
export type { SymptomTriageConfig } from "./types/plugin-config.js";
export * from "./types/triage.js";
