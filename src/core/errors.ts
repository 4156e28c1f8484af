export type HarvestErrorKind =
  | "transport"
  | "decode"
  | "structure_not_found"
  | "exhaustion_guard"
  | "round_probe"
  | "round_resolution"
  | "config";

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-2xx response. */
export class TransportError extends HarvestError {
  readonly kind = "transport";
  readonly url: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, details: { url: string; status?: number; retryable: boolean; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.url = details.url;
    this.status = details.status;
    this.retryable = details.retryable;
  }
}

export class DecodeError extends HarvestError {
  readonly kind = "decode";
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.url = url;
  }
}

export class StructureNotFoundError extends HarvestError {
  readonly kind = "structure_not_found";
}

/** A safety ceiling stopped work before the source ran dry. */
export class ExhaustionGuardTripped extends HarvestError {
  readonly kind = "exhaustion_guard";
  readonly guard: string;
  readonly limit: number;

  constructor(guard: string, limit: number) {
    super(`${guard} reached (limit ${limit})`);
    this.guard = guard;
    this.limit = limit;
  }
}

/** The existence oracle could not answer for a round; not the same as "absent". */
export class RoundProbeError extends HarvestError {
  readonly kind = "round_probe";
  readonly round: number;

  constructor(round: number, message: string, options?: { cause?: unknown }) {
    super(`probe for round ${round} failed: ${message}`, options);
    this.round = round;
  }
}

export class RoundResolutionError extends HarvestError {
  readonly kind = "round_resolution";
}

export class ConfigError extends HarvestError {
  readonly kind = "config";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
