import { DefinitionLoader } from '../../protocol/loader';
import { SessionStore } from '../../state/session-store';
import { DEFAULT_HISTORY_LIMIT } from '../../../config/constants';
import { formatTransition, ok, fail } from '../format';

/**
 * Show the saved session's transition history
 */
export async function showHistory(
  cwd: string,
  options: { limit?: number; definitionPath?: string } = {},
): Promise<number> {
  const limit = options.limit ?? DEFAULT_HISTORY_LIMIT;
  const loader = new DefinitionLoader();
  const { automaton } = await loader.loadAutomaton(cwd, options.definitionPath);
  const session = await new SessionStore(cwd).load(automaton);

  const frames = [...session.replay()];
  if (frames.length === 0) {
    console.log(`No transition history. Current state: ${session.getCurrentState()}`);
    return 0;
  }

  console.log('');
  console.log('── Transition History ──────────────────');
  for (const frame of frames.slice(-limit)) {
    const line = `${frame.index + 1}. ${formatTransition(frame.record)}`;
    console.log(`  ${frame.record.accepted ? ok(line) : fail(line)}`);
  }
  console.log('');
  console.log(`Current state: ${session.getCurrentState()}`);
  console.log('');

  return 0;
}
