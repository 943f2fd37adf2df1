/**
 * Tests for StateModel construction
 */

import { describe, it, expect } from 'vitest';
import { MalformedActionTripleError } from '@bellman/mdp-contracts';
import { StateModel, decodeTriples, parseNumberToken } from '../state-model.js';

describe('StateModel', () => {
  describe('fromTriples', () => {
    it('should group triples by action in first-seen order', () => {
      const state = StateModel.fromTriples('S1', 2, [
        'a', 'S1', '1.0',
        'b', 'S2', '0.5',
        'b', 'S3', '0.5',
      ]);

      expect(state.name).toBe('S1');
      expect(state.reward).toBe(2);
      expect([...state.actions.keys()]).toEqual(['a', 'b']);
      expect([...(state.actions.get('b') ?? [])]).toEqual([
        ['S2', 0.5],
        ['S3', 0.5],
      ]);
      expect(state.actionCount).toBe(2);
    });

    it('should keep the last probability of a repeated action/destination pair', () => {
      const state = StateModel.fromTriples('S1', 0, [
        'a', 'S1', '0.2',
        'a', 'S2', '0.3',
        'a', 'S1', '0.7',
      ]);

      expect([...(state.actions.get('a') ?? [])]).toEqual([
        ['S1', 0.7],
        ['S2', 0.3],
      ]);
    });

    it('should build a state without actions from an empty list', () => {
      const state = StateModel.fromTriples('S2', 10, []);

      expect(state.actions.size).toBe(0);
      expect(state.destinations()).toEqual([]);
    });

    it('should reject token lists that are not groups of three', () => {
      expect(() => StateModel.fromTriples('S1', 0, ['a', 'S1'])).toThrow(
        MalformedActionTripleError
      );
      expect(() => StateModel.fromTriples('S1', 0, ['a', 'S1'])).toThrow(
        'Expected action tokens in groups of 3, got 2'
      );
    });

    it('should reject unparseable probabilities', () => {
      expect(() => StateModel.fromTriples('S1', 0, ['a', 'S1', '0.5x'])).toThrow(
        'Probability "0.5x" of action "a" is not a number'
      );
    });
  });

  it('should not see later changes to the source maps', () => {
    const outcomes = new Map([['S2', 1]]);
    const actions = new Map([['go', outcomes]]);
    const state = new StateModel('S1', 0, actions);

    outcomes.set('S3', 0.5);
    actions.set('stay', new Map());

    expect([...state.actions.keys()]).toEqual(['go']);
    expect(state.actions.get('go')?.size).toBe(1);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it('should list destinations once each', () => {
    const state = StateModel.fromTriples('S1', 0, [
      'a', 'S2', '0.5',
      'a', 'S1', '0.5',
      'b', 'S2', '1',
    ]);

    expect(state.destinations()).toEqual(['S2', 'S1']);
  });
});

describe('decodeTriples', () => {
  it('should produce ordered records', () => {
    expect(decodeTriples(['go', 'S2', '0.25', 'go', 'S3', '.75'])).toEqual([
      { action: 'go', destination: 'S2', probability: 0.25 },
      { action: 'go', destination: 'S3', probability: 0.75 },
    ]);
  });
});

describe('parseNumberToken', () => {
  it('should accept decimal and exponent notation', () => {
    expect(parseNumberToken('1')).toBe(1);
    expect(parseNumberToken('1.')).toBe(1);
    expect(parseNumberToken('.5')).toBe(0.5);
    expect(parseNumberToken('1e-3')).toBe(0.001);
    expect(parseNumberToken('-0.25')).toBe(-0.25);
    expect(parseNumberToken('inf')).toBe(Infinity);
  });

  it('should reject everything else', () => {
    expect(parseNumberToken('')).toBeNull();
    expect(parseNumberToken('abc')).toBeNull();
    expect(parseNumberToken('0.5)')).toBeNull();
    expect(parseNumberToken('nan')).toBeNull();
  });
});
