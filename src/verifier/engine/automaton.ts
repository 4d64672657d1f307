import { AutomatonDefinitionSchema, SessionSnapshotSchema, formatIssues } from '../protocol/schemas';
import { TCP_HANDSHAKE_DEFINITION } from '../protocol/canonical';
import { ConfigError, SessionStateError } from '../errors';
import { TransitionTable } from './table';
import { AutomatonSession } from './session';
import type { AutomatonDefinitionInput, AutomatonDescription, VerifyResult } from '../types';

/**
 * Handshake DFA. Holds the validated, read-only transition table and hands
 * out independent sessions; it carries no run state of its own.
 */
export class HandshakeAutomaton {
  private readonly table: TransitionTable;

  private constructor(table: TransitionTable) {
    this.table = table;
  }

  /**
   * Build an automaton from a definition (the TCP handshake by default).
   * Throws ConfigError listing every problem found.
   */
  static create(definition: AutomatonDefinitionInput = TCP_HANDSHAKE_DEFINITION): HandshakeAutomaton {
    const parsed = AutomatonDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ConfigError(formatIssues(parsed.error));
    }
    return new HandshakeAutomaton(TransitionTable.fromDefinition(parsed.data));
  }

  get name(): string {
    return this.table.name;
  }

  get transitionTable(): TransitionTable {
    return this.table;
  }

  createSession(): AutomatonSession {
    return new AutomatonSession(this.table);
  }

  /**
   * Rebuild a session from persisted data.
   * Throws SessionStateError if the data is not a run of this automaton.
   */
  restoreSession(snapshot: unknown): AutomatonSession {
    const parsed = SessionSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new SessionStateError(`Malformed session: ${formatIssues(parsed.error).join('; ')}`);
    }
    return new AutomatonSession(this.table, parsed.data);
  }

  /**
   * Verify a sequence on a throwaway session.
   */
  verify(symbols: readonly string[]): VerifyResult {
    return this.createSession().verify(symbols);
  }

  describe(): AutomatonDescription {
    return this.table.describe();
  }
}
