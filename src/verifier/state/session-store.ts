import * as fs from 'fs/promises';
import * as path from 'path';
import { SessionSnapshotSchema, formatIssues } from '../protocol/schemas';
import { SessionStateError } from '../errors';
import { PROJECT_DIR_NAME, SESSION_FILE_NAME } from '../../config/constants';
import { log } from '../../shared/logger';
import type { HandshakeAutomaton } from '../engine/automaton';
import type { AutomatonSession } from '../engine/session';
import type { SessionSnapshot } from '../types';

/**
 * Persists one step-mode session between CLI invocations.
 */
export class SessionStore {
  private sessionPath: string;

  constructor(projectDir: string) {
    this.sessionPath = path.join(projectDir, PROJECT_DIR_NAME, SESSION_FILE_NAME);
  }

  get filePath(): string {
    return this.sessionPath;
  }

  /**
   * Read the raw snapshot, or null if none was saved.
   */
  async read(): Promise<SessionSnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.sessionPath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new SessionStateError(`Session file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, this.sessionPath);
    }

    const parsed = SessionSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new SessionStateError(`Session file does not match the session schema: ${formatIssues(parsed.error).join('; ')}`, this.sessionPath);
    }
    return parsed.data;
  }

  /**
   * Restore the saved session for this automaton, or start a fresh one.
   */
  async load(automaton: HandshakeAutomaton): Promise<AutomatonSession> {
    const snapshot = await this.read();
    if (!snapshot) {
      log('[session] No saved session, starting fresh', { path: this.sessionPath });
      return automaton.createSession();
    }
    if (snapshot.definition !== undefined && snapshot.definition !== automaton.name) {
      throw new SessionStateError(
        `Session was recorded with definition '${snapshot.definition}', not '${automaton.name}'. Run "tcp-handshake reset" to start over`,
        this.sessionPath,
      );
    }
    try {
      return automaton.restoreSession(snapshot);
    } catch (err) {
      if (err instanceof SessionStateError) {
        throw new SessionStateError(err.message, this.sessionPath);
      }
      throw err;
    }
  }

  /**
   * Save atomically (write to temp, then rename)
   */
  async save(session: AutomatonSession): Promise<void> {
    const snapshot: SessionSnapshot = {
      ...session.snapshot(),
      updated_at: new Date().toISOString(),
    };
    SessionSnapshotSchema.parse(snapshot);

    await fs.mkdir(path.dirname(this.sessionPath), { recursive: true });
    const tempPath = `${this.sessionPath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2));
    await fs.rename(tempPath, this.sessionPath);
    log('[session] Saved', { state: snapshot.current_state, records: snapshot.history.length });
  }

  /**
   * Remove the saved session
   */
  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.sessionPath);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw err;
      }
      return false;
    }
  }
}
