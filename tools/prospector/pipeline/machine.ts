import type { PipelinePhase, StageOutcome, StepName } from "./types.js";

/** The stage that runs while the pipeline is in `phase`, if any. */
export function stageForPhase(phase: PipelinePhase): StepName | undefined {
  switch (phase) {
    case "enhancing":
      return "enhance";
    case "discovering":
      return "discover";
    case "ranking":
      return "rank";
    case "start":
    case "done":
      return undefined;
  }
}

/**
 * Linear chain with two guarded exits: a terminating outcome from enhance or
 * discover moves straight to `done`. No phase is visited twice.
 */
export function nextPhase(phase: PipelinePhase, outcome?: StageOutcome): PipelinePhase {
  if (outcome?.kind === "terminate") {
    return "done";
  }
  switch (phase) {
    case "start":
      return "enhancing";
    case "enhancing":
      return "discovering";
    case "discovering":
      return "ranking";
    case "ranking":
    case "done":
      return "done";
  }
}
