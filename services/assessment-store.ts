import { randomUUID } from "node:crypto";
import {
  ASSESSED_SEVERITIES,
  UNKNOWN_SEVERITY,
  isAssessedSeverity,
  type AssessedSeverity,
  type AssessmentResult,
  type SeverityClass,
} from "../types/triage.js";
import type { TriageDb } from "./db.js";
import { withTriageTransaction } from "./db.js";

export type TriageAssessmentRecord = {
  id: string;
  patient_id: string;
  symptoms: string;
  severity: AssessedSeverity;
  recommendation: string;
  ai_severity: AssessedSeverity;
  ai_confidence: number;
  is_reviewed: boolean;
  reviewed_by_staff_id: string | null;
  reviewed_at: string | null;
  created_at: string;
};

export type NewTriageAssessment = {
  patient_id: string;
  symptoms: string;
  assessment: AssessmentResult;
  id?: string;
  now?: Date;
};

export type TriageReviewInput = {
  severity: SeverityClass;
  recommendation: string;
  is_reviewed?: boolean;
  staff_id?: string | null;
  now?: Date;
};

export type TriageListOptions = {
  patient_id?: string;
  reviewed?: boolean;
  limit?: number;
};

export type TriageSeverityCount = {
  severity: AssessedSeverity;
  count: number;
};

export type TriageStats = {
  total: number;
  reviewed: number;
  pending: number;
  severity_counts: TriageSeverityCount[];
};

export type TriageAssessmentStore = {
  create: (input: NewTriageAssessment) => TriageAssessmentRecord;
  get: (id: string) => TriageAssessmentRecord | null;
  review: (id: string, input: TriageReviewInput) => TriageAssessmentRecord | null;
  list: (options?: TriageListOptions) => TriageAssessmentRecord[];
  stats: () => TriageStats;
};

type TriageAssessmentRow = {
  id: string;
  patient_id: string;
  symptoms: string;
  severity: string;
  recommendation: string;
  ai_severity: string;
  ai_confidence: number;
  is_reviewed: number;
  reviewed_by_staff_id: string | null;
  reviewed_at: string | null;
  created_at: string;
};

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 200;

const TABLE_NAME = "triage_assessments";

function toSeverity(value: string): AssessedSeverity {
  return isAssessedSeverity(value) ? value : UNKNOWN_SEVERITY;
}

function mapRow(row: TriageAssessmentRow): TriageAssessmentRecord {
  return {
    id: row.id,
    patient_id: row.patient_id,
    symptoms: row.symptoms,
    severity: toSeverity(row.severity),
    recommendation: row.recommendation,
    ai_severity: toSeverity(row.ai_severity),
    ai_confidence: row.ai_confidence,
    is_reviewed: row.is_reviewed === 1,
    reviewed_by_staff_id: row.reviewed_by_staff_id,
    reviewed_at: row.reviewed_at,
    created_at: row.created_at,
  };
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function resolveListLimit(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.min(MAX_LIST_LIMIT, Math.floor(value));
}

export function createTriageAssessmentStore(db: TriageDb): TriageAssessmentStore {
  const selectById = db.prepare<[string], TriageAssessmentRow>(
    `SELECT * FROM ${TABLE_NAME} WHERE id = ?`,
  );

  function get(id: string): TriageAssessmentRecord | null {
    const row = selectById.get(id);
    return row ? mapRow(row) : null;
  }

  return {
    create(input) {
      const id = input.id ?? randomUUID();
      const createdAt = (input.now ?? new Date()).toISOString();
      const confidence = clampConfidence(input.assessment.confidence);

      withTriageTransaction(db, () => {
        db.prepare(
          `INSERT INTO ${TABLE_NAME}
            (id, patient_id, symptoms, severity, recommendation, ai_severity, ai_confidence, is_reviewed, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, 0, ?)`,
        ).run(
          id,
          input.patient_id,
          input.symptoms,
          input.assessment.severity,
          input.assessment.recommendation,
          input.assessment.severity,
          confidence,
          createdAt,
        );
      });

      const inserted = get(id);
      if (!inserted) {
        throw new Error(`Insert succeeded but no row returned for ${TABLE_NAME}`);
      }
      return inserted;
    },

    get,

    review(id, input) {
      const isReviewed = input.is_reviewed ?? true;
      const reviewedAt = isReviewed ? (input.now ?? new Date()).toISOString() : null;

      const changes = withTriageTransaction(db, () => {
        return db
          .prepare(
            `UPDATE ${TABLE_NAME}
              SET severity = ?, recommendation = ?, is_reviewed = ?, reviewed_by_staff_id = ?, reviewed_at = ?
            WHERE id = ?`,
          )
          .run(
            input.severity,
            input.recommendation,
            isReviewed ? 1 : 0,
            input.staff_id ?? null,
            reviewedAt,
            id,
          ).changes;
      });

      return changes > 0 ? get(id) : null;
    },

    list(options) {
      const clauses: string[] = [];
      const params: Array<string | number> = [];
      if (options?.patient_id !== undefined) {
        clauses.push("patient_id = ?");
        params.push(options.patient_id);
      }
      if (options?.reviewed !== undefined) {
        clauses.push("is_reviewed = ?");
        params.push(options.reviewed ? 1 : 0);
      }

      const whereSql = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
      return db
        .prepare<Array<string | number>, TriageAssessmentRow>(
          `SELECT * FROM ${TABLE_NAME}${whereSql} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
        )
        .all(...params, resolveListLimit(options?.limit))
        .map(mapRow);
    },

    stats() {
      const totals = db
        .prepare<[], { total: number; reviewed: number }>(
          `SELECT COUNT(*) AS total, COALESCE(SUM(is_reviewed), 0) AS reviewed FROM ${TABLE_NAME}`,
        )
        .get() ?? { total: 0, reviewed: 0 };
      const grouped = db
        .prepare<[], { severity: string; count: number }>(
          `SELECT severity, COUNT(*) AS count FROM ${TABLE_NAME} GROUP BY severity`,
        )
        .all();

      const countBySeverity = new Map(grouped.map((row) => [row.severity, row.count]));
      const severityCounts = ASSESSED_SEVERITIES.map((severity) => ({
        severity,
        count: countBySeverity.get(severity) ?? 0,
      })).filter((entry) => entry.count > 0);

      return {
        total: totals.total,
        reviewed: totals.reviewed,
        pending: totals.total - totals.reviewed,
        severity_counts: severityCounts,
      };
    },
  };
}
