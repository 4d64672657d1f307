import type { StepResult, TransitionRecord } from '../types';

export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const RESET = '\x1b[0m';

export function ok(text: string): string {
  return `${GREEN}✓${RESET} ${text}`;
}

export function fail(text: string): string {
  return `${RED}✗${RESET} ${text}`;
}

export function warn(text: string): string {
  return `${YELLOW}!${RESET} ${text}`;
}

export function formatTransition(record: Pick<TransitionRecord, 'from' | 'symbol' | 'to'>): string {
  return `${record.from} --[${record.symbol}]--> ${record.to}`;
}

export function formatStep(step: StepResult): string {
  const line = formatTransition({ from: step.old_state, symbol: step.symbol, to: step.new_state });
  return step.accepted ? ok(line) : `${fail(line)}  ${step.message}`;
}

/**
 * Split symbol arguments given as words or comma-separated lists.
 * Tokens are kept as written; empty or padded ones reach the engine as invalid symbols.
 */
export function splitSymbols(args: string[]): string[] {
  return args.flatMap(arg => arg.split(','));
}
