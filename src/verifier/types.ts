import { z } from 'zod';
import * as schemas from './protocol/schemas';

export type HandshakeState = z.infer<typeof schemas.HandshakeStateSchema>;
export type HandshakeSymbol = z.infer<typeof schemas.HandshakeSymbolSchema>;
export type TransitionRule = z.infer<typeof schemas.TransitionRuleSchema>;
export type HandshakePath = z.infer<typeof schemas.HandshakePathSchema>;
export type AutomatonDefinition = z.infer<typeof schemas.AutomatonDefinitionSchema>;
export type AutomatonDefinitionInput = z.input<typeof schemas.AutomatonDefinitionSchema>;
export type TransitionRecord = z.infer<typeof schemas.TransitionRecordSchema>;
export type SessionSnapshot = z.infer<typeof schemas.SessionSnapshotSchema>;

/**
 * Input token after the alphabet check at the boundary.
 */
export type ParsedSymbol =
  | { kind: 'known'; symbol: HandshakeSymbol }
  | { kind: 'unknown'; raw: string };

/**
 * Table cell. A missing rule is an outcome, not a missing key.
 */
export type TransitionOutcome =
  | { defined: true; to: HandshakeState }
  | { defined: false };

export type StepOutcome =
  | 'accepted'
  | 'invalid_symbol'
  | 'undefined_transition'
  | 'already_in_error';

export interface StepResult {
  symbol: string;
  accepted: boolean;
  old_state: HandshakeState;
  new_state: HandshakeState;
  message: string;
  outcome: StepOutcome;
}

export interface VerifyResult {
  valid: boolean;
  steps: StepResult[];
  final_state: HandshakeState;
  message: string;
  matched_path?: string;
}

export interface DescribedTransition {
  from: HandshakeState;
  symbol: HandshakeSymbol;
  to: HandshakeState;
}

export interface AutomatonDescription {
  name: string;
  states: HandshakeState[];
  alphabet: HandshakeSymbol[];
  transitions: DescribedTransition[];
  start_state: HandshakeState;
  accepting_states: HandshakeState[];
  paths: ResolvedPath[];
}

export interface ResolvedPath {
  name: string;
  description?: string;
  symbols: readonly HandshakeSymbol[];
}

export interface ReplayFrame {
  index: number;
  record: TransitionRecord;
  state_after: HandshakeState;
}
