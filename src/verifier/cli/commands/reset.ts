import { DefinitionLoader } from '../../protocol/loader';
import { SessionStore } from '../../state/session-store';
import { ok } from '../format';

/**
 * Put the saved session back at the start state with an empty history
 */
export async function resetSession(cwd: string, definitionPath?: string): Promise<number> {
  const loader = new DefinitionLoader();
  const { automaton } = await loader.loadAutomaton(cwd, definitionPath);
  const store = new SessionStore(cwd);

  const session = automaton.createSession();
  await store.save(session);

  console.log(ok(`Session reset to ${session.getCurrentState()}.`));
  return 0;
}
