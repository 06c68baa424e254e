import {
  createIngestionStateMachine,
  IllegalPhaseTransitionError
} from "../../src/core/ingestion/ingestion.state";

describe("ingestion state machine", () => {
  it("walks the normal lifecycle with checkpoints", () => {
    const state = createIngestionStateMachine();
    const seen: string[] = [state.phase()];

    for (const next of ["RUNNING", "CHECKPOINTING", "RUNNING", "CHECKPOINTING", "COMPLETE"] as const) {
      state.transition(next);
      seen.push(state.phase());
    }

    expect(seen).toEqual(["INITIALIZING", "RUNNING", "CHECKPOINTING", "RUNNING", "CHECKPOINTING", "COMPLETE"]);
  });

  it("rejects skipping initialization", () => {
    const state = createIngestionStateMachine();
    expect(() => state.transition("CHECKPOINTING")).toThrow(IllegalPhaseTransitionError);
    expect(() => state.transition("CHECKPOINTING")).toThrow("Illegal ingestion phase transition INITIALIZING -> CHECKPOINTING");
    expect(state.phase()).toBe("INITIALIZING");
  });

  it("does not leave COMPLETE", () => {
    const state = createIngestionStateMachine();
    state.transition("RUNNING");
    state.transition("COMPLETE");

    expect(() => state.transition("RUNNING")).toThrow("Illegal ingestion phase transition COMPLETE -> RUNNING");
  });
});
