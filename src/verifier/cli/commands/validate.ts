import * as path from 'path';
import { DefinitionLoader } from '../../protocol/loader';
import { HandshakeAutomaton } from '../../engine/automaton';
import { ConfigError } from '../../errors';
import { fail, ok, warn } from '../format';
import { PROJECT_DIR_NAME } from '../../../config/constants';

/**
 * Validate a definition file (or the project's) against the schema and table rules
 */
export async function validateDefinition(cwd: string, file?: string): Promise<number> {
  const loader = new DefinitionLoader();

  console.log('Validating automaton definition...');
  console.log('');

  try {
    const { definition, source } = await loader.load(cwd, file);
    if (!source) {
      console.log(warn(`No definition file in ${path.join(cwd, PROJECT_DIR_NAME)}; checking the built-in definition.`));
    }

    const automaton = HandshakeAutomaton.create(definition);
    const description = automaton.describe();
    console.log(ok(`Definition '${description.name}' is valid`));
    console.log(`  Transitions: ${description.transitions.length}`);
    console.log(`  Start:       ${description.start_state}`);
    console.log(`  Accepting:   ${description.accepting_states.join(', ')}`);
    console.log(`  Paths:       ${description.paths.length}`);
    console.log('');
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.log(fail(`Errors: ${err.issues.length}`));
      for (const issue of err.issues) {
        console.log(`  ${fail(issue)}`);
      }
      console.log('');
      return 1;
    }
    throw err;
  }
}
