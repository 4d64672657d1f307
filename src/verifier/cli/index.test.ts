import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parseCliOptions, runHandshakeCli } from './index';
import { SessionStore } from '../state/session-store';
import { ok, fail, warn } from './format';

describe('runHandshakeCli', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = (): string[] => logSpy.mock.calls.map(args => args.join(' '));
  const errored = (): string[] => errorSpy.mock.calls.map(args => args.join(' '));

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'handshake-cli-test-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('verify', () => {
    it('should exit 0 for a valid handshake', async () => {
      const code = await runHandshakeCli(['verify', 'LISTEN', 'SYN', 'ACK'], tempDir);

      expect(code).toBe(0);
      expect(logged()).toContain('Final state: ESTABLISHED');
      expect(logged()).toContain(ok('Valid TCP handshake: server-side handshake (LISTEN -> SYN -> ACK)'));
    });

    it('should accept comma-separated symbols', async () => {
      const code = await runHandshakeCli(['verify', 'SYN,SYN_ACK'], tempDir);

      expect(code).toBe(0);
      expect(logged()).toContain('Verifying: SYN SYN_ACK');
    });

    it('should exit 1 and show the failing step', async () => {
      const code = await runHandshakeCli(['verify', 'LISTEN', 'ACK'], tempDir);

      expect(code).toBe(1);
      expect(logged()).toContain(`  2. ${fail('LISTEN --[ACK]--> ERROR')}  Invalid transition: no rule for LISTEN with input 'ACK'`);
      expect(logged()).toContain('Final state: ERROR');
    });

    it('should pass empty comma-separated tokens through as invalid symbols', async () => {
      const code = await runHandshakeCli(['verify', 'SYN,,SYN_ACK'], tempDir);

      expect(code).toBe(1);
      expect(logged()).toContain(`  2. ${fail('SYN_SENT --[]--> ERROR')}  Invalid symbol '': expected one of LISTEN, SYN, SYN_ACK, ACK`);
      expect(logged()).toContain('Final state: ERROR');
    });

    it('should not trim padded symbols', async () => {
      const code = await runHandshakeCli(['verify', 'SYN, SYN_ACK'], tempDir);

      expect(code).toBe(1);
      expect(logged()).toContain(`  2. ${fail('SYN_SENT --[ SYN_ACK]--> ERROR')}  Invalid symbol ' SYN_ACK': expected one of LISTEN, SYN, SYN_ACK, ACK`);
    });

    it('should exit 1 without symbols', async () => {
      const code = await runHandshakeCli(['verify'], tempDir);

      expect(code).toBe(1);
      expect(errored()).toEqual(['No packets provided. Usage: tcp-handshake verify <symbol...>']);
    });
  });

  describe('step mode', () => {
    it('should persist the session across invocations', async () => {
      expect(await runHandshakeCli(['step', 'LISTEN'], tempDir)).toBe(0);
      expect(await runHandshakeCli(['step', 'SYN'], tempDir)).toBe(0);
      expect(await runHandshakeCli(['step', 'ACK'], tempDir)).toBe(0);

      expect(logged()).toContain('Current state: ESTABLISHED (3 step(s) recorded)');
      const snapshot = await new SessionStore(tempDir).read();
      expect(snapshot?.current_state).toBe('ESTABLISHED');
      expect(snapshot?.history.map(r => r.symbol)).toEqual(['LISTEN', 'SYN', 'ACK']);
    });

    it('should exit 1 on a rejected step and stay in ERROR', async () => {
      expect(await runHandshakeCli(['step', 'ACK'], tempDir)).toBe(1);
      expect(await runHandshakeCli(['step', 'LISTEN'], tempDir)).toBe(1);

      expect(logged()).toContain(`${fail('ERROR --[LISTEN]--> ERROR')}  Automaton already in error state; input 'LISTEN' ignored`);
      const snapshot = await new SessionStore(tempDir).read();
      expect(snapshot?.current_state).toBe('ERROR');
      expect(snapshot?.history).toHaveLength(2);
    });

    it('should record an empty symbol as an invalid step', async () => {
      expect(await runHandshakeCli(['step', ''], tempDir)).toBe(1);

      expect(errored()).toEqual([]);
      const snapshot = await new SessionStore(tempDir).read();
      expect(snapshot?.current_state).toBe('ERROR');
      expect(snapshot?.history).toEqual([{ symbol: '', from: 'CLOSED', to: 'ERROR', accepted: false }]);
    });

    it('should exit 1 when step has no argument', async () => {
      expect(await runHandshakeCli(['step'], tempDir)).toBe(1);
      expect(errored()).toEqual(['No input provided. Usage: tcp-handshake step <symbol>']);
    });

    it('should reset the saved session', async () => {
      await runHandshakeCli(['step', 'ACK'], tempDir);
      expect(await runHandshakeCli(['reset'], tempDir)).toBe(0);

      const snapshot = await new SessionStore(tempDir).read();
      expect(snapshot?.current_state).toBe('CLOSED');
      expect(snapshot?.history).toEqual([]);
      expect(logged()).toContain(ok('Session reset to CLOSED.'));
    });

    it('should show the history with a limit', async () => {
      await runHandshakeCli(['step', 'SYN'], tempDir);
      await runHandshakeCli(['step', 'SYN_ACK'], tempDir);
      logSpy.mockClear();

      expect(await runHandshakeCli(['history', '--limit', '1'], tempDir)).toBe(0);
      expect(logged()).toContain(`  ${ok('2. SYN_SENT --[SYN_ACK]--> ESTABLISHED')}`);
      expect(logged()).not.toContain(`  ${ok('1. CLOSED --[SYN]--> SYN_SENT')}`);
    });

    it('should report an empty history', async () => {
      expect(await runHandshakeCli(['history'], tempDir)).toBe(0);
      expect(logged()).toEqual(['No transition history. Current state: CLOSED']);
    });
  });

  describe('validate', () => {
    it('should exit 1 and list issues for a bad definition', async () => {
      await fs.writeFile(path.join(tempDir, 'bad.yaml'), [
        'start_state: OPEN',
        'accepting_states: [ESTABLISHED]',
        'transitions: []',
      ].join('\n'));

      const code = await runHandshakeCli(['validate', 'bad.yaml'], tempDir);

      expect(code).toBe(1);
      expect(logged()).toContain(`  ${fail("start state 'OPEN' is not a declared state")}`);
    });

    it('should accept the built-in definition', async () => {
      expect(await runHandshakeCli(['validate'], tempDir)).toBe(0);
      expect(logged()).toContain(ok("Definition 'tcp-handshake' is valid"));
    });
  });

  describe('other commands', () => {
    it('should describe the transition table', async () => {
      expect(await runHandshakeCli(['describe'], tempDir)).toBe(0);
      expect(logged()).toContain('Source:    built-in');
      expect(logged()).toContain('  SYN_SENT --[SYN_ACK]--> ESTABLISHED');
    });

    it('should run the example catalogue', async () => {
      expect(await runHandshakeCli(['examples'], tempDir)).toBe(0);
      expect(logged()).toContain(`${fail('Wrong Order')}: ACK SYN LISTEN`);
      expect(logged().some(line => line.includes(', got '))).toBe(false);
    });

    it('should exit 1 when an example does not get its expected verdict', async () => {
      await fs.mkdir(path.join(tempDir, '.handshake'), { recursive: true });
      await fs.writeFile(path.join(tempDir, '.handshake', 'automaton.yaml'), [
        'name: client-only',
        'start_state: CLOSED',
        'accepting_states: [ESTABLISHED]',
        'transitions:',
        '  - { from: CLOSED, symbol: SYN, to: SYN_SENT }',
        '  - { from: SYN_SENT, symbol: SYN_ACK, to: ESTABLISHED }',
      ].join('\n'));

      expect(await runHandshakeCli(['examples'], tempDir)).toBe(1);
      expect(logged()).toContain(`    ${warn('expected valid, got invalid')}`);
    });

    it('should fail on an unknown command', async () => {
      expect(await runHandshakeCli(['launch'], tempDir)).toBe(1);
      expect(errored()).toEqual(['Unknown command: launch']);
    });

    it('should turn a missing definition into an error exit', async () => {
      expect(await runHandshakeCli(['describe', '--definition', 'nope.yaml'], tempDir)).toBe(1);
      expect(errored()).toEqual([`Error: Automaton definition not found: ${path.join(tempDir, 'nope.yaml')}`]);
    });
  });
});

describe('parseCliOptions', () => {
  it('should separate options from positional arguments', () => {
    expect(parseCliOptions(['LISTEN', '-d', 'a.yaml', '--limit=3', 'SYN'])).toEqual({
      definition: 'a.yaml',
      limit: 3,
      positional: ['LISTEN', 'SYN'],
    });
  });

  it('should reject a non-numeric limit', () => {
    expect(() => parseCliOptions(['--limit', 'many'])).toThrow('Invalid --limit value: many');
  });
});
