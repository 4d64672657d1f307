import { DefinitionLoader } from '../../protocol/loader';
import { EXAMPLE_SEQUENCES } from '../../protocol/canonical';
import { fail, ok, warn } from '../format';

/**
 * Run every catalogued example sequence and print its verdict
 */
export async function listExamples(cwd: string, definitionPath?: string): Promise<number> {
  const loader = new DefinitionLoader();
  const { automaton } = await loader.loadAutomaton(cwd, definitionPath);

  let mismatches = 0;

  console.log('Example packet sequences:');
  console.log('');

  for (const example of EXAMPLE_SEQUENCES) {
    const result = automaton.verify(example.packets);
    const verdict = result.valid ? 'valid' : 'invalid';
    const mark = result.valid ? ok : fail;

    console.log(`${mark(example.name)}: ${example.packets.join(' ')}`);
    console.log(`    ${example.description}`);
    console.log(`    ${result.message}`);
    if (verdict !== example.expected) {
      mismatches++;
      console.log(`    ${warn(`expected ${example.expected}, got ${verdict}`)}`);
    }
  }
  console.log('');

  return mismatches > 0 ? 1 : 0;
}
