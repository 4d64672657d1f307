import { DefinitionLoader } from '../../protocol/loader';
import { SessionStore } from '../../state/session-store';
import { formatStep, warn } from '../format';

/**
 * Apply one symbol to the saved step-mode session
 */
export async function stepSession(cwd: string, symbol: string | undefined, definitionPath?: string): Promise<number> {
  if (symbol === undefined) {
    console.error('No input provided. Usage: tcp-handshake step <symbol>');
    return 1;
  }

  const loader = new DefinitionLoader();
  const { automaton } = await loader.loadAutomaton(cwd, definitionPath);
  const store = new SessionStore(cwd);
  const session = await store.load(automaton);

  const result = session.step(symbol);
  await store.save(session);

  console.log(formatStep(result));
  if (result.accepted) {
    console.log(`  ${result.message}`);
  }
  console.log(`Current state: ${session.getCurrentState()} (${session.getHistory().length} step(s) recorded)`);
  if (session.isAccepting()) {
    console.log(`  ${session.getCurrentState()} is an accepting state.`);
  } else if (session.isInError()) {
    console.log(warn('Session is in ERROR. Run "tcp-handshake reset" to start over.'));
  }

  return result.accepted ? 0 : 1;
}
