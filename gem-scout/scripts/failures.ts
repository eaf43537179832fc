import { ScoutError, errorMessage } from "./errors";
import type { FailKind } from "./types";

export function classifyFailure(error: unknown): { kind: FailKind; message: string; hints: string[] } {
  const message = errorMessage(error);

  if (!(error instanceof ScoutError)) {
    return {
      kind: "UNKNOWN",
      message,
      hints: ["Inspect mission events for the last successful step"],
    };
  }

  switch (error.kind) {
    case "INVALID_INPUT":
      return {
        kind: error.kind,
        message,
        hints: ["Check topics and the shape of scout.config.json"],
      };
    case "CONFIGURATION_ERROR":
      return {
        kind: error.kind,
        message,
        hints: ["Make the five weights sum to 1.0", "Keep probeConcurrency below the smallest probe quota"],
      };
    case "UPSTREAM_UNAVAILABLE":
      return {
        kind: error.kind,
        message,
        hints: ["Check GITHUB_TOKEN scopes", "Retry later; completed phases are kept"],
      };
    case "TIMEOUT":
      return {
        kind: error.kind,
        message,
        hints: ["Raise phaseTimeoutsMs for this phase", "Resume with the same MISSION_ID"],
      };
    case "PERSISTENCE_ERROR":
      return {
        kind: error.kind,
        message,
        hints: ["Check that the missions directory is writable"],
      };
    case "CANCELLED":
      return {
        kind: error.kind,
        message,
        hints: ["Resume with the same MISSION_ID"],
      };
    case "QUOTA_EXCEEDED":
      return {
        kind: error.kind,
        message,
        hints: ["Lower quotas or probeConcurrency"],
      };
    default:
      return { kind: "UNKNOWN", message, hints: [] };
  }
}
