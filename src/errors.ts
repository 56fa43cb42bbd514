/**
 * Failure of one isolated unit of a sync pass (an app, a deployment or a
 * host). Carried in neverthrow results and in the pass report.
 */

export type UnitKind = "app" | "deployment" | "host";

export interface UnitError {
  kind: UnitKind;
  id: string;
  message: string;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function unitError(kind: UnitKind, id: string) {
  return (err: unknown): UnitError => ({ kind, id, message: errorMessage(err) });
}
