// src/openqa/errors.ts

/** Loader failure, schema violation, or an empty harmonized table. Not recoverable per question. */
export class DatasetBuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatasetBuildError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
