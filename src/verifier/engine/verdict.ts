import type { TransitionTable } from './table';
import type { HandshakeState, StepResult } from '../types';

export interface Verdict {
  valid: boolean;
  message: string;
  matched_path?: string;
}

/**
 * Decide a finished run. Any rejected step makes the run invalid,
 * whatever state it ended in.
 */
export function judgeRun(table: TransitionTable, steps: readonly StepResult[], finalState: HandshakeState): Verdict {
  if (steps.length === 0) {
    return {
      valid: table.isAccepting(finalState),
      message: 'No transitions executed',
    };
  }

  const failedAt = steps.findIndex(s => !s.accepted);
  if (failedAt !== -1) {
    const failed = steps[failedAt];
    return {
      valid: false,
      message: `Invalid packet sequence: step ${failedAt + 1} ('${failed.symbol}') rejected. ${failed.message}`,
    };
  }

  if (!table.isAccepting(finalState)) {
    return {
      valid: false,
      message: `Invalid packet sequence: ended in ${finalState}, which is not an accepting state`,
    };
  }

  const symbols = steps.map(s => s.symbol);
  const path = table.paths.find(p =>
    p.symbols.length === symbols.length && p.symbols.every((sym, i) => sym === symbols[i])
  );
  if (path) {
    return {
      valid: true,
      message: `Valid TCP handshake: ${path.name} (${path.symbols.join(' -> ')})`,
      matched_path: path.name,
    };
  }

  return {
    valid: true,
    message: `Valid TCP handshake: reached ${finalState}`,
  };
}
