export type DeterministicError = {
  ok: false;
  code: string;
  message: string;
  details?: unknown;
  retryable?: boolean;
};

export function err(code: string, message: string, details?: unknown, retryable = false): DeterministicError {
  return { ok: false, code, message, details, retryable };
}

export function isDeterministicError(x: unknown): x is DeterministicError {
  if (!x || typeof x !== "object") return false;
  return (
    "ok" in x && x.ok === false &&
    "code" in x && typeof x.code === "string" &&
    "message" in x && typeof x.message === "string"
  );
}

/** Message of anything thrown, for log lines. */
export function describeError(e: unknown): string {
  if (isDeterministicError(e)) return `${e.code}: ${e.message}`;
  if (e instanceof Error) return e.message;
  return String(e);
}
