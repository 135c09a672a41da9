import { join } from "path";
import { writeJsonAtomic } from "../lib/json.js";
import { runDir } from "../lib/paths.js";
import { errorMessage } from "./errors.js";
import { emitAgentEvent } from "./events.js";

export const ARTIFACT_NAMES = {
  enhanceOutput: "enhance-output.json",
  searchResults: "search-results.json",
  rawPages: "raw-pages.json",
  rankedLeads: "ranked-leads.json",
  summary: "summary.json",
} as const;

export type ArtifactName = (typeof ARTIFACT_NAMES)[keyof typeof ARTIFACT_NAMES];

/**
 * Writes per-run JSON artifacts under `<workDir>/<runId>/`. Without a work
 * dir nothing is written. Write failures are reported as events and never
 * reach the caller.
 */
export class ArtifactWriter {
  constructor(public readonly workDir?: string) {}

  get enabled(): boolean {
    return this.workDir !== undefined;
  }

  runDirectory(runId: string): string | undefined {
    return this.workDir === undefined ? undefined : runDir(this.workDir, runId);
  }

  write(runId: string, name: ArtifactName, value: unknown): string | undefined {
    const directory = this.runDirectory(runId);
    if (!directory) {
      return undefined;
    }
    const path = join(directory, name);
    try {
      writeJsonAtomic(path, value);
      emitAgentEvent({
        level: "info",
        eventType: "artifact.persist",
        message: "Artifact written",
        phase: "end",
        artifact: name,
        path,
      });
      return path;
    } catch (error) {
      emitAgentEvent({
        level: "warn",
        eventType: "artifact.persist",
        message: "Artifact could not be written",
        phase: "fail",
        artifact: name,
        path,
        errorMessage: errorMessage(error),
      });
      return undefined;
    }
  }
}
