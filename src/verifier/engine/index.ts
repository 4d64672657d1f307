export { HandshakeAutomaton } from './automaton';
export { AutomatonSession, findHistoryProblem } from './session';
export { TransitionTable, parseSymbol, parseState } from './table';
export { judgeRun } from './verdict';
export type { Verdict } from './verdict';
