import {
  ERROR_STATE,
  HANDSHAKE_STATES,
  HANDSHAKE_SYMBOLS,
  HandshakeStateSchema,
  HandshakeSymbolSchema,
} from '../protocol/schemas';
import { ConfigError } from '../errors';
import type {
  AutomatonDefinition,
  AutomatonDescription,
  DescribedTransition,
  HandshakeState,
  HandshakeSymbol,
  ParsedSymbol,
  ResolvedPath,
  TransitionOutcome,
} from '../types';

/**
 * Map a caller-supplied token onto the alphabet.
 */
export function parseSymbol(raw: string): ParsedSymbol {
  const parsed = HandshakeSymbolSchema.safeParse(raw);
  return parsed.success
    ? { kind: 'known', symbol: parsed.data }
    : { kind: 'unknown', raw };
}

export function parseState(raw: string): HandshakeState | undefined {
  const parsed = HandshakeStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Immutable (state, symbol) -> state function built from a definition.
 * Every cell of the domain answers: either a target state or "undefined".
 */
export class TransitionTable {
  readonly name: string;
  readonly startState: HandshakeState;
  readonly acceptingStates: ReadonlySet<HandshakeState>;
  readonly paths: readonly ResolvedPath[];
  private readonly cells: ReadonlyMap<HandshakeState, ReadonlyMap<HandshakeSymbol, HandshakeState>>;
  private readonly ordered: readonly DescribedTransition[];

  private constructor(params: {
    name: string;
    startState: HandshakeState;
    acceptingStates: HandshakeState[];
    transitions: DescribedTransition[];
    paths: ResolvedPath[];
  }) {
    this.name = params.name;
    this.startState = params.startState;
    this.acceptingStates = new Set(params.acceptingStates);
    this.ordered = Object.freeze(params.transitions.map(t => Object.freeze({ ...t })));
    this.paths = Object.freeze(params.paths.map(p => Object.freeze({ ...p, symbols: Object.freeze([...p.symbols]) })));

    const cells = new Map<HandshakeState, Map<HandshakeSymbol, HandshakeState>>();
    for (const state of HANDSHAKE_STATES) {
      cells.set(state, new Map());
    }
    for (const t of this.ordered) {
      cells.get(t.from)?.set(t.symbol, t.to);
    }
    this.cells = cells;
  }

  /**
   * Validate a definition and build the table.
   * Collects every problem before failing; nothing is built on failure.
   */
  static fromDefinition(definition: AutomatonDefinition): TransitionTable {
    const issues: string[] = [];

    const startState = parseState(definition.start_state);
    if (!startState) {
      issues.push(`start state '${definition.start_state}' is not a declared state`);
    }

    const acceptingStates: HandshakeState[] = [];
    for (const raw of definition.accepting_states) {
      const state = parseState(raw);
      if (!state) {
        issues.push(`accepting state '${raw}' is not a declared state`);
      } else if (state === ERROR_STATE) {
        issues.push(`${ERROR_STATE} cannot be an accepting state`);
      } else if (!acceptingStates.includes(state)) {
        acceptingStates.push(state);
      }
    }

    const transitions: DescribedTransition[] = [];
    const seen = new Map<string, HandshakeState>();
    definition.transitions.forEach((rule, i) => {
      const where = `transitions[${i}]`;
      const from = parseState(rule.from);
      const symbol = parseSymbol(rule.symbol);
      const to = parseState(rule.to);

      if (!from) issues.push(`${where}: unknown state '${rule.from}'`);
      if (symbol.kind === 'unknown') issues.push(`${where}: unknown symbol '${rule.symbol}'`);
      if (!to) issues.push(`${where}: unknown state '${rule.to}'`);
      if (!from || symbol.kind === 'unknown' || !to) return;

      if (from === ERROR_STATE) {
        issues.push(`${where}: ${ERROR_STATE} is absorbing and cannot have outgoing transitions`);
        return;
      }

      const key = `${from}:${symbol.symbol}`;
      const existing = seen.get(key);
      if (existing !== undefined) {
        if (existing !== to) {
          issues.push(`${where}: ${from} + ${symbol.symbol} already leads to ${existing}, cannot also lead to ${to}`);
        }
        return;
      }
      seen.set(key, to);
      transitions.push({ from, symbol: symbol.symbol, to });
    });

    const paths: ResolvedPath[] = [];
    for (const path of definition.paths) {
      const symbols: HandshakeSymbol[] = [];
      for (const raw of path.symbols) {
        const parsed = parseSymbol(raw);
        if (parsed.kind === 'unknown') {
          issues.push(`path '${path.name}': unknown symbol '${raw}'`);
        } else {
          symbols.push(parsed.symbol);
        }
      }
      if (symbols.length === path.symbols.length) {
        paths.push({ name: path.name, description: path.description, symbols });
      }
    }

    if (!startState || issues.length > 0) {
      throw new ConfigError(issues);
    }

    const table = new TransitionTable({
      name: definition.name,
      startState,
      acceptingStates,
      transitions,
      paths,
    });

    const unreachable = paths.filter(p => !table.accepts(p.symbols)).map(p => `path '${p.name}' does not end in an accepting state`);
    if (unreachable.length > 0) {
      throw new ConfigError(unreachable);
    }

    return table;
  }

  lookup(state: HandshakeState, symbol: HandshakeSymbol): TransitionOutcome {
    const to = this.cells.get(state)?.get(symbol);
    return to === undefined ? { defined: false } : { defined: true, to };
  }

  isAccepting(state: HandshakeState): boolean {
    return this.acceptingStates.has(state);
  }

  /**
   * Whether the symbols, run from the start state, stay defined and end accepting.
   */
  accepts(symbols: readonly HandshakeSymbol[]): boolean {
    let state = this.startState;
    for (const symbol of symbols) {
      const outcome = this.lookup(state, symbol);
      if (!outcome.defined) return false;
      state = outcome.to;
    }
    return this.isAccepting(state);
  }

  rules(): DescribedTransition[] {
    return this.ordered.map(t => ({ ...t }));
  }

  describe(): AutomatonDescription {
    return {
      name: this.name,
      states: this.states,
      alphabet: this.alphabet,
      transitions: this.rules(),
      start_state: this.startState,
      accepting_states: [...this.acceptingStates],
      paths: this.paths.map(p => ({ ...p, symbols: [...p.symbols] })),
    };
  }

  get states(): HandshakeState[] {
    return [...HANDSHAKE_STATES];
  }

  get alphabet(): HandshakeSymbol[] {
    return [...HANDSHAKE_SYMBOLS];
  }
}
