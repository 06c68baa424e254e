export type IngestionPhase = "INITIALIZING" | "RUNNING" | "CHECKPOINTING" | "COMPLETE";

const allowedTransitions: Record<IngestionPhase, readonly IngestionPhase[]> = {
  INITIALIZING: ["RUNNING"],
  RUNNING: ["CHECKPOINTING", "COMPLETE"],
  CHECKPOINTING: ["RUNNING", "COMPLETE"],
  COMPLETE: []
};

export class IllegalPhaseTransitionError extends Error {
  constructor(readonly from: IngestionPhase, readonly to: IngestionPhase) {
    super(`Illegal ingestion phase transition ${from} -> ${to}`);
    this.name = "IllegalPhaseTransitionError";
  }
}

export const createIngestionStateMachine = () => {
  let phase: IngestionPhase = "INITIALIZING";

  return {
    phase: () => phase,
    transition: (next: IngestionPhase) => {
      if (!allowedTransitions[phase].includes(next)) {
        throw new IllegalPhaseTransitionError(phase, next);
      }
      phase = next;
    }
  };
};
