import { describe, expect, it } from "vitest";
import {
  LOW_CONFIDENCE_DISCLAIMER,
  SEVERITY_RECOMMENDATIONS,
  UNKNOWN_SEVERITY_RECOMMENDATION,
  recommend,
} from "../services/recommendation.js";

describe("symptom triage recommendation", () => {
  it("returns the base text at or above the threshold", () => {
    expect(recommend("High", 0.6)).toBe(SEVERITY_RECOMMENDATIONS.High);
    expect(recommend("Critical", 0.95)).toBe(SEVERITY_RECOMMENDATIONS.Critical);
  });

  it("appends the disclaimer after a blank line below the threshold", () => {
    expect(recommend("Low", 0.59)).toBe(`${SEVERITY_RECOMMENDATIONS.Low}\n\n${LOW_CONFIDENCE_DISCLAIMER}`);
  });

  it("honors a custom threshold", () => {
    expect(recommend("Medium", 0.4, 0.3)).toBe(SEVERITY_RECOMMENDATIONS.Medium);
    expect(recommend("Medium", 0.4, 0.5).endsWith(LOW_CONFIDENCE_DISCLAIMER)).toBe(true);
  });

  it("treats a NaN confidence as low confidence", () => {
    expect(recommend("Low", Number.NaN)).toBe(`${SEVERITY_RECOMMENDATIONS.Low}\n\n${LOW_CONFIDENCE_DISCLAIMER}`);
  });

  it("uses the generic consult text for unknown severity", () => {
    expect(recommend("Unknown", 0.9)).toBe(UNKNOWN_SEVERITY_RECOMMENDATION);
    expect(recommend("Unknown", 0)).toBe(`${UNKNOWN_SEVERITY_RECOMMENDATION}\n\n${LOW_CONFIDENCE_DISCLAIMER}`);
  });

  it("keeps each severity's urgency wording", () => {
    expect(SEVERITY_RECOMMENDATIONS.Low).toContain("non-urgent");
    expect(SEVERITY_RECOMMENDATIONS.Medium).toContain("1-2 days");
    expect(SEVERITY_RECOMMENDATIONS.High).toContain("within 24 hours");
    expect(SEVERITY_RECOMMENDATIONS.Critical).toContain("emergency");
  });
});
