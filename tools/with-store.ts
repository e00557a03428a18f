import { parseSymptomTriageConfig } from "../config.js";
import type { SymptomTriagePluginApi } from "../types/plugin-api.js";
import {
  createTriageAssessmentStore,
  type TriageAssessmentStore,
} from "../services/assessment-store.js";
import { closeTriageDb, openTriageDb } from "../services/db.js";
import { runTriageMigrations } from "../services/migrations.js";

export function withAssessmentStore<T>(
  api: SymptomTriagePluginApi,
  run: (store: TriageAssessmentStore) => T,
): T {
  const config = parseSymptomTriageConfig(api.pluginConfig);
  const db = openTriageDb(config.dbPath);
  try {
    runTriageMigrations({ db, logger: api.logger });
    return run(createTriageAssessmentStore(db));
  } finally {
    closeTriageDb(db);
  }
}
