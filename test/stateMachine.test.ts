import { RunTracker, StateMachine } from '../src/orchestration/StateMachine';
import { RunStage } from '../src/types';

describe('StateMachine', () => {
  const sm = new StateMachine();

  test('allows the forward path', () => {
    expect(sm.canTransition(RunStage.Collecting, RunStage.Prompting)).toEqual({ allowed: true });
    expect(sm.canTransition(RunStage.Prompting, RunStage.Invoking)).toEqual({ allowed: true });
    expect(sm.canTransition(RunStage.Invoking, RunStage.Parsing)).toEqual({ allowed: true });
    expect(sm.canTransition(RunStage.Parsing, RunStage.PostProcessing)).toEqual({ allowed: true });
    expect(sm.canTransition(RunStage.PostProcessing, RunStage.Done)).toEqual({ allowed: true });
  });

  test('any live stage may fail', () => {
    expect(sm.canTransition(RunStage.Invoking, RunStage.Failed)).toEqual({ allowed: true });
    expect(sm.canTransition(RunStage.Collecting, RunStage.Failed)).toEqual({ allowed: true });
  });

  test('refuses skipping or going back', () => {
    const result = sm.canTransition(RunStage.Collecting, RunStage.Parsing);

    expect(result.allowed).toBe(false);
    expect(result.reason).toBe('Cannot move from Collecting to Parsing: next stage is Prompting.');
    expect(sm.canTransition(RunStage.Parsing, RunStage.Invoking).allowed).toBe(false);
  });

  test('terminal stages are final', () => {
    expect(sm.canTransition(RunStage.Done, RunStage.Failed)).toEqual({
      allowed: false,
      reason: 'Run already finished in Done.'
    });
    expect(sm.canTransition(RunStage.Failed, RunStage.Collecting).allowed).toBe(false);
    expect(sm.isTerminal(RunStage.Failed)).toBe(true);
    expect(sm.isTerminal(RunStage.Parsing)).toBe(false);
  });
});

describe('RunTracker', () => {
  const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

  test('starts in Collecting and records each move', () => {
    const tracker = new RunTracker(new StateMachine(), fixedNow);
    tracker.advance(RunStage.Prompting);
    tracker.fail('template missing');

    expect(tracker.stage).toBe(RunStage.Failed);
    expect(tracker.history).toEqual([
      { stage: RunStage.Collecting, ts: '2026-01-01T00:00:00.000Z' },
      { stage: RunStage.Prompting, ts: '2026-01-01T00:00:00.000Z' },
      { stage: RunStage.Failed, ts: '2026-01-01T00:00:00.000Z', detail: 'template missing' }
    ]);
  });

  test('throws on a blocked move', () => {
    const tracker = new RunTracker();

    expect(() => tracker.advance(RunStage.Done)).toThrow(
      'Transition blocked: Cannot move from Collecting to Done: next stage is Prompting.'
    );
  });

  test('cannot fail twice', () => {
    const tracker = new RunTracker();
    tracker.fail('first');

    expect(() => tracker.fail('second')).toThrow('Transition blocked: Run already finished in Failed.');
  });
});
