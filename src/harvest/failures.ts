import { errorMessage, HarvestError } from "../core/errors";
import { FailureKind, UnitFailure } from "../types";

export function unitId(round: number, tier: number, page?: number): string {
  return page === undefined ? `${round}:${tier}` : `${round}:${tier}:${page}`;
}

function failureKindOf(error: unknown): FailureKind {
  if (!(error instanceof HarvestError)) {
    return "unexpected";
  }
  switch (error.kind) {
    case "transport":
    case "decode":
    case "structure_not_found":
    case "exhaustion_guard":
      return error.kind;
    default:
      return "unexpected";
  }
}

export function toUnitFailure(unit: string, error: unknown): UnitFailure {
  return { unit, kind: failureKindOf(error), reason: errorMessage(error) };
}
