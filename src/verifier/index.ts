// Protocol
export { DefinitionLoader } from './protocol/loader';
export type { LoadedDefinition } from './protocol/loader';
export { TCP_HANDSHAKE_DEFINITION, EXAMPLE_SEQUENCES } from './protocol/canonical';
export type { ExampleSequence } from './protocol/canonical';
export * from './protocol/schemas';

// State
export { SessionStore } from './state/session-store';

// Engine
export * from './engine';

// Errors
export * from './errors';

// CLI
export { runHandshakeCli } from './cli';

// Types
export * from './types';
