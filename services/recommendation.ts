import {
  UNKNOWN_SEVERITY,
  type AssessedSeverity,
  type SeverityClass,
} from "../types/triage.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

export const LOW_CONFIDENCE_DISCLAIMER =
  "Note: This is an initial assessment with limited confidence. A healthcare professional should verify this assessment.";

export const UNKNOWN_SEVERITY_RECOMMENDATION =
  "Please consult with a healthcare professional for proper evaluation.";

export const SEVERITY_RECOMMENDATIONS: Readonly<Record<SeverityClass, string>> = {
  Low: "Your symptoms suggest a non-urgent condition. Rest, hydrate, and monitor symptoms. If they persist for more than 2-3 days or worsen, schedule a regular appointment.",
  Medium:
    "Your symptoms may require medical attention. Schedule an appointment in the next 1-2 days. Monitor for worsening symptoms.",
  High: "Your symptoms require prompt medical attention. Please schedule an urgent appointment or visit urgent care within 24 hours.",
  Critical:
    "Your symptoms suggest a potentially life-threatening condition. Seek immediate emergency medical attention or call emergency services.",
};

export function recommend(
  severity: AssessedSeverity,
  confidence: number,
  confidenceThreshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
): string {
  const base =
    severity === UNKNOWN_SEVERITY ? UNKNOWN_SEVERITY_RECOMMENDATION : SEVERITY_RECOMMENDATIONS[severity];
  // NaN confidence is treated as below threshold.
  if (!(confidence >= confidenceThreshold)) {
    return `${base}\n\n${LOW_CONFIDENCE_DISCLAIMER}`;
  }
  return base;
}
