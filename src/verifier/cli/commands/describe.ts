import { DefinitionLoader } from '../../protocol/loader';
import { formatTransition } from '../format';

/**
 * Print the automaton's states, alphabet and transition table
 */
export async function describeAutomaton(cwd: string, definitionPath?: string): Promise<number> {
  const loader = new DefinitionLoader();
  const { automaton, source } = await loader.loadAutomaton(cwd, definitionPath);
  const description = automaton.describe();

  console.log(`Automaton: ${description.name}`);
  console.log(`Source:    ${source ?? 'built-in'}`);
  console.log('');
  console.log(`States:    ${description.states.join(', ')}`);
  console.log(`Alphabet:  ${description.alphabet.join(', ')}`);
  console.log(`Start:     ${description.start_state}`);
  console.log(`Accepting: ${description.accepting_states.join(', ')}`);
  console.log('');
  console.log('── Transitions ─────────────────────────');
  for (const t of description.transitions) {
    console.log(`  ${formatTransition(t)}`);
  }

  if (description.paths.length > 0) {
    console.log('');
    console.log('── Paths ───────────────────────────────');
    for (const p of description.paths) {
      console.log(`  ${p.name}: ${p.symbols.join(' -> ')}`);
    }
  }
  console.log('');

  return 0;
}
