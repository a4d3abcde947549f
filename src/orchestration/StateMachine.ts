import { RunStage, StageEntry } from "../types";

const FORWARD: Record<RunStage, RunStage | null> = {
  [RunStage.Collecting]: RunStage.Prompting,
  [RunStage.Prompting]: RunStage.Invoking,
  [RunStage.Invoking]: RunStage.Parsing,
  [RunStage.Parsing]: RunStage.PostProcessing,
  [RunStage.PostProcessing]: RunStage.Done,
  [RunStage.Done]: null,
  [RunStage.Failed]: null
};

export class StateMachine {

  isTerminal(stage: RunStage): boolean {
    return stage === RunStage.Done || stage === RunStage.Failed;
  }

  canTransition(current: RunStage, next: RunStage): { allowed: boolean; reason?: string } {
    if (this.isTerminal(current)) {
      return { allowed: false, reason: `Run already finished in ${current}.` };
    }

    // Any live stage may fail.
    if (next === RunStage.Failed) return { allowed: true };

    const expected = FORWARD[current];
    if (next !== expected) {
      return { allowed: false, reason: `Cannot move from ${current} to ${next}: next stage is ${expected}.` };
    }
    return { allowed: true };
  }
}

/**
 * Per-run stage history. Every move goes through the state machine, so a run
 * can only walk forward or fail.
 */
export class RunTracker {
  private entries: StageEntry[];

  constructor(
    private machine: StateMachine = new StateMachine(),
    private now: () => Date = () => new Date()
  ) {
    this.entries = [{ stage: RunStage.Collecting, ts: this.now().toISOString() }];
  }

  get stage(): RunStage {
    return this.entries[this.entries.length - 1].stage;
  }

  get history(): readonly StageEntry[] {
    return this.entries;
  }

  advance(next: RunStage, detail?: string): void {
    const check = this.machine.canTransition(this.stage, next);
    if (!check.allowed) {
      throw new Error(`Transition blocked: ${check.reason}`);
    }
    this.entries.push({ stage: next, ts: this.now().toISOString(), ...(detail ? { detail } : {}) });
  }

  fail(detail: string): void {
    this.advance(RunStage.Failed, detail);
  }
}
