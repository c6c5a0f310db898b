/** Per-file result of a batch run that keeps going after a failure. */
export type FileOutcome<T> =
  | { source: string; ok: true; value: T }
  | { source: string; ok: false; error: unknown };

export function failedSources<T>(outcomes: readonly FileOutcome<T>[]): string[] {
  return outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.source);
}
