import fs from "node:fs";
import { z } from "zod";
import { SEVERITY_CLASSES, type SeverityClass, type TrainingExample } from "../types/triage.js";
import { resolvePackagePath } from "./paths.js";
import { describeError, fail, ok, type TriageResult } from "./result.js";

const TrainingExampleSchema = z.strictObject({
  text: z.string().trim().min(1),
  label: z.enum(SEVERITY_CLASSES),
});

const TrainingCorpusSchema = z.strictObject({
  version: z.literal(1),
  sets: z
    .array(
      z.strictObject({
        name: z.string().min(1),
        examples: z.array(TrainingExampleSchema).min(1),
      }),
    )
    .min(1),
});

export function defaultTrainingCorpusPath(): string {
  return resolvePackagePath("data", "triage-training-corpus.json");
}

export function parseTrainingCorpus(value: unknown): TriageResult<readonly TrainingExample[]> {
  const result = TrainingCorpusSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return fail("invalid_corpus", `training corpus failed validation: ${detail}`);
  }

  const examples = result.data.sets.flatMap((set) =>
    set.examples.map((example) => Object.freeze({ text: example.text, label: example.label })),
  );
  return ok(Object.freeze(examples));
}

export function loadTrainingCorpus(
  corpusPath: string = defaultTrainingCorpusPath(),
): TriageResult<readonly TrainingExample[]> {
  let raw: string;
  try {
    raw = fs.readFileSync(corpusPath, "utf8");
  } catch (error) {
    return fail("invalid_corpus", `training corpus not readable at ${corpusPath}: ${describeError(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return fail("invalid_corpus", `training corpus is not valid JSON: ${describeError(error)}`);
  }
  return parseTrainingCorpus(parsed);
}

export function countExamplesByLabel(
  examples: readonly TrainingExample[],
): Record<SeverityClass, number> {
  const counts: Record<SeverityClass, number> = { Low: 0, Medium: 0, High: 0, Critical: 0 };
  for (const example of examples) {
    counts[example.label] += 1;
  }
  return counts;
}
