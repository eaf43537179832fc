import { randomUUID } from "node:crypto";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { isNotFound, readJsonFile, writeJsonAtomic } from "./artifacts";
import { PersistenceError, errorMessage } from "./errors";
import { MissionSchema } from "./schemas";
import type { Mission, MissionPhase, MissionStatus, PhaseResult } from "./types";

const TRANSITIONS: Record<MissionStatus, MissionStatus[]> = {
  gathering: ["probing", "failed"],
  probing: ["scoring", "failed"],
  scoring: ["refining", "finalized", "failed"],
  refining: ["finalized", "failed"],
  finalized: [],
  failed: ["gathering", "probing", "scoring", "refining", "finalized", "failed"],
};

export function assertTransition(from: MissionStatus, to: MissionStatus): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal mission transition ${from} -> ${to}`);
  }
}

/** The phase that runs after `cursor`, the last completed one. */
export function nextPhase(cursor: MissionPhase | null, refineEnabled: boolean): MissionPhase {
  switch (cursor) {
    case null:
      return "gathering";
    case "gathering":
      return "probing";
    case "probing":
      return "scoring";
    case "scoring":
      return refineEnabled ? "refining" : "finalized";
    case "refining":
    case "finalized":
      return "finalized";
  }
}

export function getPhaseResult<P extends PhaseResult["phase"]>(
  mission: Mission,
  phase: P,
): Extract<PhaseResult, { phase: P }> | undefined {
  for (const result of mission.phases) {
    if (isPhase(result, phase)) return result;
  }
  return undefined;
}

function isPhase<P extends PhaseResult["phase"]>(
  result: PhaseResult,
  phase: P,
): result is Extract<PhaseResult, { phase: P }> {
  return result.phase === phase;
}

/** Stores the result of a completed phase and advances cursor and status. */
export function recordPhase(mission: Mission, result: PhaseResult, refineEnabled: boolean): Mission {
  const status = nextPhase(result.phase, refineEnabled);
  assertTransition(mission.status, status);
  return {
    ...mission,
    status,
    cursor: result.phase,
    phases: [...mission.phases.filter((entry) => entry.phase !== result.phase), result],
    failure: null,
  };
}

export function newMissionId(now = new Date()): string {
  return `${now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z")}-${randomUUID().slice(0, 8)}`;
}

/**
 * Append-only mission snapshots: every persist writes a new numbered document
 * under `<root>/<mission_id>/`, and the highest number is the current state.
 */
export class MissionStore {
  constructor(private readonly rootDir: string) {}

  create(goal: string, topics: string[], missionId = newMissionId()): Mission {
    const createdAt = new Date().toISOString();
    return {
      mission_id: missionId,
      seq: 0,
      created_at: createdAt,
      updated_at: createdAt,
      goal,
      topics,
      status: "gathering",
      cursor: null,
      phases: [],
      result: null,
      failure: null,
      events: [],
    };
  }

  async persist(mission: Mission): Promise<Mission> {
    const next: Mission = { ...mission, seq: mission.seq + 1, updated_at: new Date().toISOString() };
    const fileName = `${String(next.seq).padStart(4, "0")}_${next.status}.json`;
    try {
      await writeJsonAtomic(path.join(this.missionDir(next.mission_id), fileName), next);
    } catch (error) {
      throw new PersistenceError(`Cannot persist mission ${next.mission_id}: ${errorMessage(error)}`, {
        mission_id: next.mission_id,
        seq: next.seq,
      });
    }
    return next;
  }

  async loadLatest(missionId: string): Promise<Mission | undefined> {
    const files = await this.snapshotFiles(missionId);
    const latest = files.at(-1);
    if (!latest) return undefined;

    let raw: unknown;
    try {
      raw = await readJsonFile(path.join(this.missionDir(missionId), latest));
    } catch (error) {
      throw new PersistenceError(`Cannot read mission ${missionId}: ${errorMessage(error)}`, { file: latest });
    }
    const parsed = MissionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Mission snapshot ${latest} is malformed`, { mission_id: missionId });
    }
    return parsed.data;
  }

  /** `"latest"` names the newest mission (ids sort by creation time); any other id passes through. */
  async resolveMissionId(requested: string | undefined): Promise<string | undefined> {
    if (requested !== "latest") return requested;
    const missions = await this.listMissions();
    return missions.at(-1);
  }

  async listMissions(): Promise<string[]> {
    try {
      const entries = await readdir(this.rootDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceError(`Cannot list missions: ${errorMessage(error)}`);
    }
  }

  private missionDir(missionId: string): string {
    if (!/^[\w.-]+$/.test(missionId)) {
      throw new PersistenceError(`Invalid mission id ${missionId}`);
    }
    return path.join(this.rootDir, missionId);
  }

  private async snapshotFiles(missionId: string): Promise<string[]> {
    try {
      const files = await readdir(this.missionDir(missionId));
      return files.filter((file) => /^\d+_[a-z]+\.json$/.test(file)).sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceError(`Cannot read mission ${missionId}: ${errorMessage(error)}`);
    }
  }
}
