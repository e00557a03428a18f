export const SEVERITY_CLASSES = ["Low", "Medium", "High", "Critical"] as const;

export type SeverityClass = (typeof SEVERITY_CLASSES)[number];

export const UNKNOWN_SEVERITY = "Unknown";

export const ASSESSED_SEVERITIES = [...SEVERITY_CLASSES, UNKNOWN_SEVERITY] as const;

export type AssessedSeverity = (typeof ASSESSED_SEVERITIES)[number];

export type ClassProbabilities = Record<SeverityClass, number>;

export type TrainingExample = Readonly<{
  text: string;
  label: SeverityClass;
}>;

export type AssessmentResult = {
  severity: AssessedSeverity;
  recommendation: string;
  confidence: number;
};

export function isSeverityClass(value: unknown): value is SeverityClass {
  return typeof value === "string" && (SEVERITY_CLASSES as readonly string[]).includes(value);
}

export function isAssessedSeverity(value: unknown): value is AssessedSeverity {
  return typeof value === "string" && (ASSESSED_SEVERITIES as readonly string[]).includes(value);
}
