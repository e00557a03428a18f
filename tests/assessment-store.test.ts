import { describe, expect, it } from "vitest";
import {
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
  createTriageAssessmentStore,
  resolveListLimit,
} from "../services/assessment-store.js";
import { closeTriageDb, openTriageDb, type TriageDb } from "../services/db.js";
import { runTriageMigrations } from "../services/migrations.js";
import type { AssessmentResult } from "../types/triage.js";
import { createDbPath } from "./helpers/temp-db.js";

function openMigratedDb(): TriageDb {
  const db = openTriageDb(createDbPath("store"));
  runTriageMigrations({ db });
  return db;
}

function assessment(severity: AssessmentResult["severity"], confidence: number): AssessmentResult {
  return { severity, recommendation: `${severity} advice`, confidence };
}

describe("symptom triage assessment store", () => {
  it("creates unreviewed records that keep the model's severity", () => {
    const db = openMigratedDb();
    try {
      const store = createTriageAssessmentStore(db);
      const record = store.create({
        id: "assessment-1",
        patient_id: "patient-1",
        symptoms: "Chest pain",
        assessment: assessment("High", 0.386),
        now: new Date("2026-02-07T12:00:00.000Z"),
      });

      expect(record).toEqual({
        id: "assessment-1",
        patient_id: "patient-1",
        symptoms: "Chest pain",
        severity: "High",
        recommendation: "High advice",
        ai_severity: "High",
        ai_confidence: 0.386,
        is_reviewed: false,
        reviewed_by_staff_id: null,
        reviewed_at: null,
        created_at: "2026-02-07T12:00:00.000Z",
      });
      expect(store.get("assessment-1")).toEqual(record);
      expect(store.get("missing")).toBeNull();
    } finally {
      closeTriageDb(db);
    }
  });

  it("clamps confidence into the unit interval", () => {
    const db = openMigratedDb();
    try {
      const store = createTriageAssessmentStore(db);
      expect(
        store.create({ patient_id: "p", symptoms: "x", assessment: assessment("Low", 1.5) }).ai_confidence,
      ).toBe(1);
      expect(
        store.create({ patient_id: "p", symptoms: "x", assessment: assessment("Unknown", Number.NaN) })
          .ai_confidence,
      ).toBe(0);
    } finally {
      closeTriageDb(db);
    }
  });

  it("records a staff review without touching the model output", () => {
    const db = openMigratedDb();
    try {
      const store = createTriageAssessmentStore(db);
      store.create({
        id: "assessment-1",
        patient_id: "patient-1",
        symptoms: "Chest pain",
        assessment: assessment("High", 0.386),
      });

      const reviewed = store.review("assessment-1", {
        severity: "Critical",
        recommendation: "Go to the emergency department now.",
        staff_id: "staff-9",
        now: new Date("2026-02-08T09:30:00.000Z"),
      });

      expect(reviewed).toMatchObject({
        severity: "Critical",
        recommendation: "Go to the emergency department now.",
        ai_severity: "High",
        ai_confidence: 0.386,
        is_reviewed: true,
        reviewed_by_staff_id: "staff-9",
        reviewed_at: "2026-02-08T09:30:00.000Z",
      });
      expect(store.review("missing", { severity: "Low", recommendation: "Rest." })).toBeNull();

      const reopened = store.review("assessment-1", {
        severity: "High",
        recommendation: "Urgent care today.",
        is_reviewed: false,
      });
      expect(reopened).toMatchObject({ is_reviewed: false, reviewed_at: null, reviewed_by_staff_id: null });
    } finally {
      closeTriageDb(db);
    }
  });

  it("lists newest first with patient, review and limit filters", () => {
    const db = openMigratedDb();
    try {
      const store = createTriageAssessmentStore(db);
      const base = Date.parse("2026-02-07T00:00:00.000Z");
      ["a", "b", "c"].forEach((suffix, index) => {
        store.create({
          id: `assessment-${suffix}`,
          patient_id: index === 1 ? "patient-2" : "patient-1",
          symptoms: "Cough",
          assessment: assessment("Low", 0.4),
          now: new Date(base + index * 60_000),
        });
      });
      store.review("assessment-a", { severity: "Low", recommendation: "Rest." });

      expect(store.list().map((record) => record.id)).toEqual(["assessment-c", "assessment-b", "assessment-a"]);
      expect(store.list({ patient_id: "patient-1" }).map((record) => record.id)).toEqual([
        "assessment-c",
        "assessment-a",
      ]);
      expect(store.list({ reviewed: false }).map((record) => record.id)).toEqual(["assessment-c", "assessment-b"]);
      expect(store.list({ reviewed: true }).map((record) => record.id)).toEqual(["assessment-a"]);
      expect(store.list({ limit: 1 }).map((record) => record.id)).toEqual(["assessment-c"]);
    } finally {
      closeTriageDb(db);
    }
  });

  it("summarizes review state and severity counts", () => {
    const db = openMigratedDb();
    try {
      const store = createTriageAssessmentStore(db);
      expect(store.stats()).toEqual({ total: 0, reviewed: 0, pending: 0, severity_counts: [] });

      store.create({ id: "one", patient_id: "p", symptoms: "x", assessment: assessment("Critical", 0.45) });
      store.create({ id: "two", patient_id: "p", symptoms: "x", assessment: assessment("Low", 0.47) });
      store.create({ id: "three", patient_id: "p", symptoms: "x", assessment: assessment("Low", 0.44) });
      store.review("one", { severity: "Critical", recommendation: "Call emergency services." });

      expect(store.stats()).toEqual({
        total: 3,
        reviewed: 1,
        pending: 2,
        severity_counts: [
          { severity: "Low", count: 2 },
          { severity: "Critical", count: 1 },
        ],
      });
    } finally {
      closeTriageDb(db);
    }
  });

  it("resolves list limits", () => {
    expect(resolveListLimit(undefined)).toBe(DEFAULT_LIST_LIMIT);
    expect(resolveListLimit(0)).toBe(DEFAULT_LIST_LIMIT);
    expect(resolveListLimit(Number.POSITIVE_INFINITY)).toBe(DEFAULT_LIST_LIMIT);
    expect(resolveListLimit(7.9)).toBe(7);
    expect(resolveListLimit(10_000)).toBe(MAX_LIST_LIMIT);
  });
});
