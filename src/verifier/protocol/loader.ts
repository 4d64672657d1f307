import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { AutomatonDefinitionSchema, formatIssues } from './schemas';
import { TCP_HANDSHAKE_DEFINITION } from './canonical';
import { ConfigError, DefinitionNotFoundError } from '../errors';
import { HandshakeAutomaton } from '../engine/automaton';
import { DEFINITION_FILE_NAMES, PROJECT_DIR_NAME } from '../../config/constants';
import { log } from '../../shared/logger';
import type { AutomatonDefinition } from '../types';

export interface LoadedDefinition {
  definition: AutomatonDefinition;
  /** File the definition came from; null for the built-in TCP definition */
  source: string | null;
}

export class DefinitionLoader {
  /**
   * Resolve the definition for a project:
   * explicit path, then .handshake/automaton.{yaml,yml,json}, then built-in.
   */
  async load(projectDir: string, explicitPath?: string): Promise<LoadedDefinition> {
    if (explicitPath) {
      const filePath = path.resolve(projectDir, explicitPath);
      if (!(await fileExists(filePath))) {
        throw new DefinitionNotFoundError(filePath);
      }
      return { definition: await this.loadFile(filePath), source: filePath };
    }

    const found = await this.findDefinitionFile(projectDir);
    if (found) {
      return { definition: await this.loadFile(found), source: found };
    }

    log('[loader] No definition file, using built-in TCP handshake', { projectDir });
    return { definition: TCP_HANDSHAKE_DEFINITION, source: null };
  }

  async findDefinitionFile(projectDir: string): Promise<string | null> {
    const dir = path.join(projectDir, PROJECT_DIR_NAME);
    for (const name of DEFINITION_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  /**
   * Parse and validate one definition file (YAML or JSON by extension).
   */
  async loadFile(filePath: string): Promise<AutomatonDefinition> {
    const content = await fs.readFile(filePath, 'utf-8');
    const ext = path.extname(filePath).toLowerCase();

    let data: unknown;
    try {
      data = ext === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError([`${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`]);
    }

    const parsed = AutomatonDefinitionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(formatIssues(parsed.error));
    }
    log('[loader] Loaded definition', { file: filePath, name: parsed.data.name });
    return parsed.data;
  }

  /**
   * Load the project's definition and build the automaton from it.
   */
  async loadAutomaton(projectDir: string, explicitPath?: string): Promise<{ automaton: HandshakeAutomaton; source: string | null }> {
    const { definition, source } = await this.load(projectDir, explicitPath);
    return { automaton: HandshakeAutomaton.create(definition), source };
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
