import { DefinitionLoader } from '../../protocol/loader';
import { fail, formatStep, ok } from '../format';

/**
 * Verify a whole packet sequence on a fresh session
 */
export async function verifySequence(cwd: string, symbols: string[], definitionPath?: string): Promise<number> {
  if (symbols.length === 0) {
    console.error('No packets provided. Usage: tcp-handshake verify <symbol...>');
    return 1;
  }

  const loader = new DefinitionLoader();
  const { automaton } = await loader.loadAutomaton(cwd, definitionPath);
  const result = automaton.verify(symbols);

  console.log(`Verifying: ${symbols.join(' ')}`);
  console.log('');
  result.steps.forEach((step, i) => {
    console.log(`  ${i + 1}. ${formatStep(step)}`);
  });
  console.log('');
  console.log(`Final state: ${result.final_state}`);
  console.log(result.valid ? ok(result.message) : fail(result.message));
  console.log('');

  return result.valid ? 0 : 1;
}
