// Project-local directory holding the definition and session files
export const PROJECT_DIR_NAME = '.handshake';

// Definition lookup order inside PROJECT_DIR_NAME
export const DEFINITION_FILE_NAMES = ['automaton.yaml', 'automaton.yml', 'automaton.json'] as const;

// Step-mode session
export const SESSION_FILE_NAME = 'session.json';

// History display
export const DEFAULT_HISTORY_LIMIT = 20;

// Debug logging switch
export const DEBUG_ENV_VAR = 'HANDSHAKE_DEBUG';
