/**
 * Unit tests for the model file parser
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { MalformedActionTripleError, MalformedStateLineError } from '@bellman/mdp-contracts';
import { loadModelFile, parseModel, unbracketActionTokens } from '../model-parser.js';

describe('parseModel', () => {
  it('should read one state per non-blank line in file order', () => {
    const { states, warnings } = parseModel('S1 0 (a S1 1.0) (b S2 1.0)\n\n   \nS2 10\n');

    expect([...states.keys()]).toEqual(['S1', 'S2']);
    expect(states.get('S1')?.reward).toBe(0);
    expect([...(states.get('S1')?.actions.keys() ?? [])]).toEqual(['a', 'b']);
    expect(states.get('S1')?.actions.get('b')?.get('S2')).toBe(1);
    expect(states.get('S2')?.actions.size).toBe(0);
    expect(warnings).toEqual([]);
  });

  it('should accept CRLF line endings and tabs', () => {
    const { states } = parseModel('A\t1\t(go\tB\t1)\r\nB 2\r\n');

    expect([...states.keys()]).toEqual(['A', 'B']);
    expect(states.get('A')?.actions.get('go')?.get('B')).toBe(1);
  });

  it('should accept negative and fractional rewards', () => {
    const { states } = parseModel('Pit -2.5\nGoal 1e2');

    expect(states.get('Pit')?.reward).toBe(-2.5);
    expect(states.get('Goal')?.reward).toBe(100);
  });

  it('should keep the last probability of a repeated action/destination pair', () => {
    const { states } = parseModel('S1 0 (a S2 0.2) (a S2 0.8)\nS2 1');

    expect(states.get('S1')?.actions.get('a')?.get('S2')).toBe(0.8);
  });

  it('should replace a redefined state and warn', () => {
    const { states, warnings } = parseModel('S1 1\nS2 2\nS1 3');

    expect([...states.keys()]).toEqual(['S1', 'S2']);
    expect(states.get('S1')?.reward).toBe(3);
    expect(warnings).toEqual(['Line 3: state "S1" redefined, earlier definition replaced']);
  });

  it('should reject a line without reward', () => {
    expect(() => parseModel('S1 0\nLonely')).toThrow(MalformedStateLineError);
    expect(() => parseModel('S1 0\nLonely')).toThrow('Line 2: Expected "state_name reward ..."');
  });

  it('should reject a non-numeric reward', () => {
    expect(() => parseModel('S1 ten')).toThrow('Line 1: Reward "ten" of state "S1" is not a number');
  });

  it('should reject incomplete action groups', () => {
    try {
      parseModel('S1 0 (a S1');
      expect.unreachable('parseModel should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedActionTripleError);
      expect(error).toMatchObject({ line: 1, code: 'MALFORMED_ACTION_TRIPLE' });
    }
  });

  it('should reject missing brackets', () => {
    expect(() => parseModel('S1 0 a S1 1.0)')).toThrow(
      'Line 1: Action token "a" must start with "("'
    );
    expect(() => parseModel('S1 0 (a S1 1.0')).toThrow(
      'Line 1: Probability token "1.0" must end with ")"'
    );
  });

  it('should attach the line number to unparseable probabilities', () => {
    expect(() => parseModel('S2 1\nS1 0 (a S2 x)')).toThrow(
      'Line 2: Probability "x" of action "a" is not a number'
    );
  });
});

describe('unbracketActionTokens', () => {
  it('should strip group brackets', () => {
    expect(unbracketActionTokens(['(a', 'S1', '0.5)', '(b', 'S2', '1)'], 1)).toEqual([
      'a', 'S1', '0.5',
      'b', 'S2', '1',
    ]);
  });
});

describe('loadModelFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bellman-model-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should parse a model from disk', async () => {
    const filePath = path.join(tmpDir, 'model.in');
    fs.writeFileSync(filePath, 'S1 0 (b S2 1.0)\nS2 10\n', 'utf-8');

    const { states } = await loadModelFile(filePath);

    expect([...states.keys()]).toEqual(['S1', 'S2']);
  });

  it('should reject a missing file', async () => {
    await expect(loadModelFile(path.join(tmpDir, 'absent.in'))).rejects.toThrow('ENOENT');
  });
});
