import {
  SEVERITY_CLASSES,
  type ClassProbabilities,
  type SeverityClass,
} from "../types/triage.js";
import { fail, ok, type TriageResult } from "./result.js";
import type { SparseVector } from "./tfidf-vectorizer.js";

export type LabeledVector = {
  vector: SparseVector;
  label: SeverityClass;
};

export type SeverityClassifierOptions = {
  featureCount: number;
  smoothing?: number;
};

export type SeverityPrediction = {
  label: SeverityClass;
  probabilities: ClassProbabilities;
  confidence: number;
};

export type FittedSeverityClassifier = {
  readonly classes: readonly SeverityClass[];
  readonly featureCount: number;
  logPrior: (label: SeverityClass) => number | null;
  predict: (vector: SparseVector) => SeverityPrediction;
};

type ClassParameters = {
  label: SeverityClass;
  logPrior: number;
  logLikelihoods: Float64Array;
};

export const DEFAULT_SMOOTHING = 1;

function emptyProbabilities(): ClassProbabilities {
  return { Low: 0, Medium: 0, High: 0, Critical: 0 };
}

function usableWeight(index: number, weight: number, featureCount: number): boolean {
  return (
    Number.isInteger(index) &&
    index >= 0 &&
    index < featureCount &&
    Number.isFinite(weight) &&
    weight > 0
  );
}

function fitClassParameters(
  label: SeverityClass,
  samples: readonly LabeledVector[],
  totalSamples: number,
  featureCount: number,
  smoothing: number,
): ClassParameters {
  const featureTotals = new Float64Array(featureCount);
  let grandTotal = 0;
  for (const sample of samples) {
    for (const [index, weight] of sample.vector) {
      if (usableWeight(index, weight, featureCount)) {
        featureTotals[index] += weight;
        grandTotal += weight;
      }
    }
  }

  const denominator = grandTotal + smoothing * featureCount;
  const logLikelihoods = new Float64Array(featureCount);
  for (let index = 0; index < featureCount; index += 1) {
    logLikelihoods[index] = Math.log((featureTotals[index] + smoothing) / denominator);
  }

  return {
    label,
    logPrior: Math.log(samples.length / totalSamples),
    logLikelihoods,
  };
}

export function fitSeverityClassifier(
  samples: readonly LabeledVector[],
  options: SeverityClassifierOptions,
): TriageResult<FittedSeverityClassifier> {
  const smoothing = options.smoothing ?? DEFAULT_SMOOTHING;
  const { featureCount } = options;
  if (!Number.isFinite(smoothing) || smoothing <= 0) {
    return fail("invalid_options", `smoothing must be a positive number, got ${smoothing}`);
  }
  if (!Number.isInteger(featureCount) || featureCount < 1) {
    return fail("invalid_options", `featureCount must be a positive integer, got ${featureCount}`);
  }
  if (samples.length === 0) {
    return fail("training_failed", "cannot fit a classifier without labeled samples");
  }

  const parameters: ClassParameters[] = [];
  for (const label of SEVERITY_CLASSES) {
    const classSamples = samples.filter((sample) => sample.label === label);
    if (classSamples.length > 0) {
      parameters.push(
        fitClassParameters(label, classSamples, samples.length, featureCount, smoothing),
      );
    }
  }

  return ok({
    classes: parameters.map((entry) => entry.label),
    featureCount,
    logPrior(label) {
      return parameters.find((entry) => entry.label === label)?.logPrior ?? null;
    },
    predict(vector) {
      const scores = parameters.map((entry) => {
        let score = entry.logPrior;
        for (const [index, weight] of vector) {
          if (usableWeight(index, weight, featureCount)) {
            score += weight * entry.logLikelihoods[index];
          }
        }
        return Number.isFinite(score) ? score : Number.NEGATIVE_INFINITY;
      });

      const best = Math.max(...scores);
      const probabilities = emptyProbabilities();
      if (!Number.isFinite(best)) {
        // Every score underflowed; nothing separates the classes.
        for (const entry of parameters) {
          probabilities[entry.label] = 1 / parameters.length;
        }
        const label = parameters[0].label;
        return { label, probabilities, confidence: probabilities[label] };
      }

      const exponentials = scores.map((score) => Math.exp(score - best));
      const total = exponentials.reduce((sum, value) => sum + value, 0);
      parameters.forEach((entry, index) => {
        probabilities[entry.label] = exponentials[index] / total;
      });

      const label = parameters[scores.indexOf(best)].label;
      const confidence = Math.max(...parameters.map((entry) => probabilities[entry.label]));
      return { label, probabilities, confidence };
    },
  });
}
