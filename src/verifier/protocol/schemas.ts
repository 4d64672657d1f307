import { z } from 'zod';

export const HANDSHAKE_STATES = [
  'CLOSED',
  'LISTEN',
  'SYN_SENT',
  'SYN_RECEIVED',
  'ESTABLISHED',
  'ERROR',
] as const;

export const HANDSHAKE_SYMBOLS = ['LISTEN', 'SYN', 'SYN_ACK', 'ACK'] as const;

export const ERROR_STATE = 'ERROR';

export const HandshakeStateSchema = z.enum(HANDSHAKE_STATES);
export const HandshakeSymbolSchema = z.enum(HANDSHAKE_SYMBOLS);

/**
 * Transition rule as written in a definition file.
 * Names stay plain strings here so the table builder can report every
 * unknown state or symbol at once instead of failing on the first.
 */
export const TransitionRuleSchema = z.object({
  from: z.string().min(1).describe('Source state'),
  symbol: z.string().min(1).describe('Input symbol'),
  to: z.string().min(1).describe('Target state'),
}).strict();

/**
 * Named path through the automaton, reported when a valid run matches it.
 */
export const HandshakePathSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  symbols: z.array(z.string().min(1)).min(1),
}).strict();

/**
 * Automaton definition schema.
 * One file describes the transition table, start state and accepting states.
 */
export const AutomatonDefinitionSchema = z.object({
  name: z.string().default('tcp-handshake').describe('Definition name'),
  description: z.string().optional(),
  start_state: z.string().min(1).describe('Initial state of every session'),
  accepting_states: z.array(z.string().min(1)).describe('States that end a valid run'),
  transitions: z.array(TransitionRuleSchema).describe('Defined (state, symbol) pairs'),
  paths: z.array(HandshakePathSchema).default([]).describe('Named valid runs'),
}).strict();

export const TransitionRecordSchema = z.object({
  symbol: z.string(),
  from: HandshakeStateSchema,
  to: HandshakeStateSchema,
  accepted: z.boolean(),
});

/**
 * Persisted step-mode session.
 */
export const SessionSnapshotSchema = z.object({
  definition: z.string().optional().describe('Definition name the session was created with'),
  current_state: HandshakeStateSchema,
  history: z.array(TransitionRecordSchema),
  updated_at: z.string().datetime().optional(),
});

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
