import { parseSymptomTriageConfig, type SymptomTriageConfig } from "../config.js";
import type { TriageLogger } from "../types/plugin-api.js";
import {
  UNKNOWN_SEVERITY,
  type AssessmentResult,
  type ClassProbabilities,
  type TrainingExample,
} from "../types/triage.js";
import { recommend } from "./recommendation.js";
import { describeError, fail, ok, type TriageError, type TriageResult } from "./result.js";
import {
  fitSeverityClassifier,
  type FittedSeverityClassifier,
  type SeverityPrediction,
} from "./severity-classifier.js";
import {
  createTextNormalizer,
  loadNaturalAnnotator,
  type AnnotatorLoader,
  type AnnotatorStatus,
  type TextNormalizer,
} from "./text-normalizer.js";
import { fitTfidfVectorizer, type FittedTfidfVectorizer } from "./tfidf-vectorizer.js";
import { loadTrainingCorpus } from "./training-corpus.js";

export const MODEL_UNAVAILABLE_RECOMMENDATION =
  "Error in AI model. Please consult with a healthcare professional directly.";

export const ASSESSMENT_FAILED_RECOMMENDATION =
  "An error occurred during assessment. Please consult with a healthcare professional.";

export type TriageEngineState = "uninitialized" | "ready" | "degraded";

export type TrainedTriageModel = {
  vectorizer: FittedTfidfVectorizer;
  classifier: FittedSeverityClassifier;
  trainingExamples: number;
};

export type TriageEngineStatus = {
  state: TriageEngineState;
  annotator: AnnotatorStatus;
  reason: TriageError | null;
  vocabulary_size: number | null;
  training_examples: number | null;
};

export type DetailedAssessment = AssessmentResult & {
  probabilities: ClassProbabilities | null;
  normalized_text: string | null;
};

export type TriageEngine = {
  initialize: () => Promise<TriageEngineStatus>;
  assess: (symptomsText: unknown) => Promise<AssessmentResult>;
  assessDetailed: (symptomsText: unknown) => Promise<DetailedAssessment>;
  status: () => TriageEngineStatus;
};

export type CreateTriageEngineParams = {
  config?: SymptomTriageConfig;
  logger?: TriageLogger;
  loadCorpus?: () => TriageResult<readonly TrainingExample[]>;
  annotatorLoader?: AnnotatorLoader;
};

type EngineRuntime =
  | { state: "uninitialized" }
  | { state: "ready"; model: TrainedTriageModel }
  | { state: "degraded"; reason: TriageError };

export function trainTriageModel(params: {
  examples: readonly TrainingExample[];
  normalizer: TextNormalizer;
  maxFeatures: number;
  smoothing: number;
}): TriageResult<TrainedTriageModel> {
  const texts = params.examples.map((example) => params.normalizer.normalize(example.text));
  const vectorizer = fitTfidfVectorizer(texts, { maxFeatures: params.maxFeatures });
  if (vectorizer.status === "error") {
    return vectorizer;
  }

  const samples = texts.map((text, index) => ({
    vector: vectorizer.data.transform(text),
    label: params.examples[index].label,
  }));
  const classifier = fitSeverityClassifier(samples, {
    featureCount: vectorizer.data.vocabularySize,
    smoothing: params.smoothing,
  });
  if (classifier.status === "error") {
    return classifier;
  }

  return ok({
    vectorizer: vectorizer.data,
    classifier: classifier.data,
    trainingExamples: params.examples.length,
  });
}

function unavailableAssessment(recommendation: string): DetailedAssessment {
  return {
    severity: UNKNOWN_SEVERITY,
    recommendation,
    confidence: 0,
    probabilities: null,
    normalized_text: null,
  };
}

export function createTriageEngine(params: CreateTriageEngineParams = {}): TriageEngine {
  const config = params.config ?? parseSymptomTriageConfig({});
  const logger = params.logger ?? {};
  const loadCorpus = params.loadCorpus ?? (() => loadTrainingCorpus());
  const normalizer = createTextNormalizer({
    loader: config.annotator === "disabled" ? null : (params.annotatorLoader ?? loadNaturalAnnotator),
    logger,
  });

  let runtime: EngineRuntime = { state: "uninitialized" };
  let initialization: Promise<TriageEngineStatus> | null = null;

  function buildModel(): TriageResult<TrainedTriageModel> {
    if (config.classifier === "disabled") {
      return fail("dependency_unavailable", "statistical classifier backend is disabled");
    }
    try {
      const corpus = loadCorpus();
      if (corpus.status === "error") {
        return corpus;
      }
      return trainTriageModel({
        examples: corpus.data,
        normalizer,
        maxFeatures: config.maxFeatures,
        smoothing: config.smoothing,
      });
    } catch (error) {
      return fail("training_failed", describeError(error));
    }
  }

  function settle(outcome: TriageResult<TrainedTriageModel>): void {
    if (outcome.status === "ok") {
      runtime = { state: "ready", model: outcome.data };
      logger.info?.(
        `[symptom-triage] triage model ready (${outcome.data.trainingExamples} examples, ${outcome.data.vectorizer.vocabularySize} terms)`,
      );
      return;
    }
    runtime = { state: "degraded", reason: outcome.error };
    logger.error?.(
      `[symptom-triage] triage model unavailable (${outcome.error.code}): ${outcome.error.message}`,
    );
  }

  async function runInitialization(): Promise<void> {
    await normalizer.load();
    settle(buildModel());
  }

  function status(): TriageEngineStatus {
    return {
      state: runtime.state,
      annotator: normalizer.status(),
      reason: runtime.state === "degraded" ? runtime.reason : null,
      vocabulary_size: runtime.state === "ready" ? runtime.model.vectorizer.vocabularySize : null,
      training_examples: runtime.state === "ready" ? runtime.model.trainingExamples : null,
    };
  }

  function initialize(): Promise<TriageEngineStatus> {
    if (!initialization) {
      initialization = runInitialization()
        .catch((error: unknown) => {
          settle(fail("training_failed", describeError(error)));
        })
        .then(() => status());
    }
    return initialization;
  }

  function infer(
    model: TrainedTriageModel,
    symptomsText: string,
  ): TriageResult<{ normalized: string; prediction: SeverityPrediction }> {
    try {
      const normalized = normalizer.normalize(symptomsText);
      const prediction = model.classifier.predict(model.vectorizer.transform(normalized));
      if (!Number.isFinite(prediction.confidence)) {
        return fail("inference_failed", "classifier produced a non-finite confidence");
      }
      return ok({ normalized, prediction });
    } catch (error) {
      return fail("inference_failed", describeError(error));
    }
  }

  function evaluate(symptomsText: string): DetailedAssessment {
    if (runtime.state !== "ready") {
      return unavailableAssessment(MODEL_UNAVAILABLE_RECOMMENDATION);
    }

    const outcome = infer(runtime.model, symptomsText);
    if (outcome.status === "error") {
      logger.error?.(`[symptom-triage] assessment failed: ${outcome.error.message}`);
      return unavailableAssessment(ASSESSMENT_FAILED_RECOMMENDATION);
    }

    const { normalized, prediction } = outcome.data;
    const confidence = Math.min(1, Math.max(0, prediction.confidence));
    return {
      severity: prediction.label,
      recommendation: recommend(prediction.label, confidence, config.confidenceThreshold),
      confidence,
      probabilities: prediction.probabilities,
      normalized_text: normalized,
    };
  }

  async function assessDetailed(symptomsText: unknown): Promise<DetailedAssessment> {
    await initialize();
    return evaluate(typeof symptomsText === "string" ? symptomsText : "");
  }

  return {
    initialize,
    assessDetailed,
    async assess(symptomsText) {
      const { severity, recommendation, confidence } = await assessDetailed(symptomsText);
      return { severity, recommendation, confidence };
    },
    status,
  };
}
