export type TriageErrorCode =
  | "dependency_unavailable"
  | "invalid_corpus"
  | "invalid_options"
  | "training_failed"
  | "inference_failed";

export type TriageError = {
  code: TriageErrorCode;
  message: string;
};

export type TriageResult<T> = { status: "ok"; data: T } | { status: "error"; error: TriageError };

export function ok<T>(data: T): TriageResult<T> {
  return { status: "ok", data };
}

export function fail<T>(code: TriageErrorCode, message: string): TriageResult<T> {
  return { status: "error", error: { code, message } };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
