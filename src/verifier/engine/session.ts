import { ERROR_STATE, HANDSHAKE_SYMBOLS } from '../protocol/schemas';
import { SessionStateError } from '../errors';
import { parseSymbol, type TransitionTable } from './table';
import { judgeRun } from './verdict';
import type {
  AutomatonDescription,
  HandshakeState,
  ReplayFrame,
  SessionSnapshot,
  StepResult,
  TransitionRecord,
  VerifyResult,
} from '../types';

/**
 * One run of the automaton: current state plus the ordered history of
 * every attempted transition. Owned by a single caller; the table is shared.
 */
export class AutomatonSession {
  private readonly table: TransitionTable;
  private currentState: HandshakeState;
  private history: TransitionRecord[] = [];

  constructor(table: TransitionTable, snapshot?: SessionSnapshot) {
    this.table = table;
    this.currentState = table.startState;

    if (snapshot) {
      const problem = findHistoryProblem(table, snapshot);
      if (problem) {
        throw new SessionStateError(`Session does not match automaton '${table.name}': ${problem}`);
      }
      this.currentState = snapshot.current_state;
      this.history = snapshot.history.map(r => ({ ...r }));
    }
  }

  getCurrentState(): HandshakeState {
    return this.currentState;
  }

  getHistory(): TransitionRecord[] {
    return this.history.map(r => ({ ...r }));
  }

  isInError(): boolean {
    return this.currentState === ERROR_STATE;
  }

  isAccepting(): boolean {
    return this.table.isAccepting(this.currentState);
  }

  /**
   * Back to the start state. Prior history is discarded.
   */
  reset(): void {
    this.currentState = this.table.startState;
    this.history = [];
  }

  /**
   * Consume one input token. Always appends exactly one history record;
   * bad input is reported in the result, never thrown.
   */
  step(symbol: string): StepResult {
    const from = this.currentState;

    if (from === ERROR_STATE) {
      return this.record(symbol, from, ERROR_STATE, 'already_in_error',
        `Automaton already in error state; input '${symbol}' ignored`);
    }

    const parsed = parseSymbol(symbol);
    if (parsed.kind === 'unknown') {
      return this.record(symbol, from, ERROR_STATE, 'invalid_symbol',
        `Invalid symbol '${parsed.raw}': expected one of ${HANDSHAKE_SYMBOLS.join(', ')}`);
    }

    const outcome = this.table.lookup(from, parsed.symbol);
    if (!outcome.defined) {
      return this.record(symbol, from, ERROR_STATE, 'undefined_transition',
        `Invalid transition: no rule for ${from} with input '${parsed.symbol}'`);
    }

    return this.record(symbol, from, outcome.to, 'accepted',
      `Valid transition: ${from} -> ${parsed.symbol} -> ${outcome.to}`);
  }

  /**
   * Run a whole sequence from the start state. Every symbol is consumed,
   * including those after the run has failed, so the history is complete.
   */
  verify(symbols: readonly string[]): VerifyResult {
    this.reset();
    const steps = symbols.map(symbol => this.step(symbol));
    const verdict = judgeRun(this.table, steps, this.currentState);

    const result: VerifyResult = {
      valid: verdict.valid,
      steps,
      final_state: this.currentState,
      message: verdict.message,
    };
    if (verdict.matched_path) {
      result.matched_path = verdict.matched_path;
    }
    return result;
  }

  describe(): AutomatonDescription {
    return this.table.describe();
  }

  snapshot(): SessionSnapshot {
    return {
      definition: this.table.name,
      current_state: this.currentState,
      history: this.getHistory(),
    };
  }

  /**
   * Frames for step-by-step playback of the recorded run.
   */
  *replay(): Generator<ReplayFrame> {
    const records = this.getHistory();
    for (let index = 0; index < records.length; index++) {
      const record = records[index];
      yield { index, record, state_after: record.to };
    }
  }

  private record(
    symbol: string,
    from: HandshakeState,
    to: HandshakeState,
    outcome: StepResult['outcome'],
    message: string,
  ): StepResult {
    const accepted = outcome === 'accepted';
    this.currentState = to;
    this.history.push({ symbol, from, to, accepted });
    return { symbol, accepted, old_state: from, new_state: to, message, outcome };
  }
}

/**
 * Check that a snapshot is a run this table could have produced.
 * Returns a description of the first problem, or undefined.
 */
export function findHistoryProblem(table: TransitionTable, snapshot: SessionSnapshot): string | undefined {
  let expected = table.startState;

  for (let i = 0; i < snapshot.history.length; i++) {
    const record = snapshot.history[i];
    const where = `history[${i}]`;

    if (record.from !== expected) {
      return `${where} starts in ${record.from}, expected ${expected}`;
    }

    if (record.from === ERROR_STATE) {
      if (record.to !== ERROR_STATE || record.accepted) {
        return `${where} leaves ${ERROR_STATE}`;
      }
    } else {
      const parsed = parseSymbol(record.symbol);
      const outcome = parsed.kind === 'known' ? table.lookup(record.from, parsed.symbol) : { defined: false as const };
      if (outcome.defined) {
        if (!record.accepted || record.to !== outcome.to) {
          return `${where} should be ${record.from} -> ${record.symbol} -> ${outcome.to}`;
        }
      } else if (record.accepted || record.to !== ERROR_STATE) {
        return `${where} has no rule for ${record.from} with input '${record.symbol}'`;
      }
    }

    expected = record.to;
  }

  if (snapshot.current_state !== expected) {
    return `current state ${snapshot.current_state} does not follow from history (expected ${expected})`;
  }
  return undefined;
}
