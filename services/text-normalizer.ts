import type { TriageLogger } from "../types/plugin-api.js";
import { describeError } from "./result.js";

export type TextAnnotator = {
  // Base forms of the content tokens of already lower-cased text.
  annotate: (text: string) => string[];
};

export type AnnotatorLoader = () => Promise<TextAnnotator>;

type AnnotatorState =
  | { status: "unloaded" }
  | { status: "loading"; pending: Promise<void> }
  | { status: "ready"; annotator: TextAnnotator }
  | { status: "unavailable"; reason: string };

export type AnnotatorStatus = AnnotatorState["status"];

export type TextNormalizer = {
  load: () => Promise<AnnotatorStatus>;
  normalize: (text: string) => string;
  status: () => AnnotatorStatus;
  unavailableReason: () => string | null;
};

export type CreateTextNormalizerParams = {
  // null turns the annotator off; regex normalization is used throughout.
  loader: AnnotatorLoader | null;
  logger?: TriageLogger;
};

const NON_WORD_PATTERN = /[^\p{L}\p{M}\p{N}_\s]/gu;

export function normalizeWithRegex(text: string): string {
  return text.toLowerCase().replace(NON_WORD_PATTERN, "");
}

// Stemming cost grows with the square of a token's length; longer tokens pass through unstemmed.
export const MAX_STEMMED_TOKEN_LENGTH = 64;

const TOKEN_SEPARATOR_PATTERN = /[^\p{L}\p{M}\p{N}_]+/u;

export async function loadNaturalAnnotator(): Promise<TextAnnotator> {
  const { default: natural } = await import("natural");
  const stopwords = new Set(natural.stopwords);

  return {
    annotate(text) {
      return text
        .split(TOKEN_SEPARATOR_PATTERN)
        .filter((token) => token.length > 0 && !stopwords.has(token))
        .map((token) =>
          token.length > MAX_STEMMED_TOKEN_LENGTH ? token : natural.PorterStemmer.stem(token),
        )
        .filter((base) => base.length > 0);
    },
  };
}

export function createTextNormalizer(params: CreateTextNormalizerParams): TextNormalizer {
  const logger = params.logger ?? {};
  let state: AnnotatorState = params.loader
    ? { status: "unloaded" }
    : { status: "unavailable", reason: "annotator disabled by config" };
  let annotateFailureLogged = false;

  async function runLoader(loader: AnnotatorLoader): Promise<void> {
    try {
      const annotator = await loader();
      state = { status: "ready", annotator };
      logger.info?.("[symptom-triage] linguistic annotator loaded");
    } catch (error) {
      const reason = describeError(error);
      state = { status: "unavailable", reason };
      logger.warn?.(
        `[symptom-triage] linguistic annotator unavailable, using regex normalization: ${reason}`,
      );
    }
  }

  return {
    async load() {
      if (state.status === "unloaded" && params.loader) {
        state = { status: "loading", pending: runLoader(params.loader) };
      }
      if (state.status === "loading") {
        await state.pending;
      }
      return state.status;
    },

    normalize(text) {
      const lowered = text.toLowerCase();
      if (state.status === "ready") {
        try {
          return state.annotator.annotate(lowered).join(" ");
        } catch (error) {
          if (!annotateFailureLogged) {
            annotateFailureLogged = true;
            logger.warn?.(
              `[symptom-triage] annotator failed, falling back to regex normalization: ${describeError(error)}`,
            );
          }
        }
      }
      return normalizeWithRegex(lowered);
    },

    status() {
      return state.status;
    },

    unavailableReason() {
      return state.status === "unavailable" ? state.reason : null;
    },
  };
}
