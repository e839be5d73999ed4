export type UpstreamSource = "nci" | "pubchem" | "descriptor-service" | "usda";

export type UpstreamReason = "not_found" | "timeout" | "upstream_error";

/** A drug or food lookup failed; the request cannot be answered. */
export class UpstreamUnavailableError extends Error {
  readonly source: UpstreamSource;
  readonly reason: UpstreamReason;

  constructor(source: UpstreamSource, reason: UpstreamReason, message: string) {
    super(message);
    this.name = "UpstreamUnavailableError";
    this.source = source;
    this.reason = reason;
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/** Wrap anything thrown while talking to `source`; upstream errors pass through unchanged. */
export function toUpstreamError(source: UpstreamSource, err: unknown): UpstreamUnavailableError {
  if (err instanceof UpstreamUnavailableError) return err;
  if (isTimeout(err)) return new UpstreamUnavailableError(source, "timeout", `${source} request timed out`);
  const msg = err instanceof Error ? err.message : String(err);
  return new UpstreamUnavailableError(source, "upstream_error", `${source} request failed: ${msg}`);
}
