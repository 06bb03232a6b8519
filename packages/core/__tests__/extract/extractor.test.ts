/**
 * Record extractor tests
 */

import { describe, it, expect } from 'vitest';
import {
  ITER_LINE_GRAMMAR,
  createRecordExtractor,
  extractRecord,
  getLineGrammar,
  listLineGrammars,
  registerLineGrammar,
  type LineGrammar,
} from '../../src/extract/index.js';
import { UnknownGrammarError } from '../../src/errors.js';

const PREFIX = '2024-05-01 10:00:00,123 - INFO - Iter: ';
const VALID_TAIL =
  '100/3 A1-B2 - Rand Eps: 0.10 lr: 0.001 Ret = 5.0 Last Crash = 2 t=0.05 SF = 1.0 Seen=1 Reward: 50.0';

function line(tail: string = VALID_TAIL): string {
  return PREFIX + tail;
}

describe('extractRecord', () => {
  it('should parse every field of a matching line', () => {
    expect(extractRecord(line())).toEqual({
      step: 100,
      episode: '3',
      decision: 'A1-B2',
      eps: 0.1,
      learningRate: 0.001,
      ret: 5,
      lastCrash: 2,
      stepTime: 0.05,
      sf: 1,
      found: true,
      reward: 50,
      text: {
        step: '100',
        eps: '0.10',
        learningRate: '0.001',
        ret: '5.0',
        lastCrash: '2',
        stepTime: '0.05',
        sf: '1.0',
        reward: '50.0',
      },
    });
  });

  it('should keep the matched text of small and signed-zero numbers', () => {
    const record = extractRecord(line(VALID_TAIL.replace('Eps: 0.10 lr: 0.001', 'Eps: 0.0000001 lr: -0.0')));
    expect(record?.eps).toBe(1e-7);
    expect(record?.text?.eps).toBe('0.0000001');
    expect(record?.text?.learningRate).toBe('-0.0');
  });

  it('should keep every digit of a step beyond the safe integer range', () => {
    const record = extractRecord(line(VALID_TAIL.replace('100/3', '12345678901234567890/3')));
    expect(record?.text?.step).toBe('12345678901234567890');
  });

  it('should turn Seen=0 into found=false', () => {
    const record = extractRecord(line(VALID_TAIL.replace('Seen=1', 'Seen=0')));
    expect(record?.found).toBe(false);
  });

  it('should accept Pred as well as Rand', () => {
    const record = extractRecord(line(VALID_TAIL.replace('Rand', 'Pred')));
    expect(record?.decision).toBe('A1-B2');
  });

  it('should accept signed numbers', () => {
    const record = extractRecord(
      line('7/12 Z9-C0 - Pred Eps: -0.5 lr: +0.01 Ret = -12.25 Last Crash = 0 t=-1 SF = -3.5 Seen=0 Reward: -100')
    );
    expect(record).toMatchObject({
      step: 7,
      episode: '12',
      decision: 'Z9-C0',
      eps: -0.5,
      learningRate: 0.01,
      ret: -12.25,
      lastCrash: 0,
      stepTime: -1,
      sf: -3.5,
      found: false,
      reward: -100,
    });
  });

  it('should keep the episode id as written', () => {
    const record = extractRecord(line(VALID_TAIL.replace('100/3', '100/007')));
    expect(record?.episode).toBe('007');
  });

  it('should tolerate flexible spacing around separators', () => {
    const record = extractRecord(
      '   x -   Iter:  5 / 9   B1-A1   -  Rand  Eps:  1  lr:  2  Ret=3  Last  Crash=4  t=5  SF=6  Seen= 1  Reward:7'
    );
    expect(record).toMatchObject({ step: 5, episode: '9', ret: 3, lastCrash: 4, reward: 7, found: true });
  });

  it('should ignore trailing content after the reward', () => {
    const record = extractRecord(line(VALID_TAIL + ' extra=1 [done]'));
    expect(record?.reward).toBe(50);
  });

  it('should return null for an unrelated line', () => {
    expect(extractRecord('2024-05-01 10:00:00 - INFO - Loading model weights')).toBeNull();
  });

  it('should return null for an empty line', () => {
    expect(extractRecord('')).toBeNull();
  });

  it('should return null when the Seen token is missing', () => {
    expect(extractRecord(line(VALID_TAIL.replace(' Seen=1', '')))).toBeNull();
  });

  it('should return null for a malformed decision label', () => {
    expect(extractRecord(line(VALID_TAIL.replace('A1-B2', 'a1-B2')))).toBeNull();
  });

  it('should return null for a malformed numeric token', () => {
    expect(extractRecord(line(VALID_TAIL.replace('lr: 0.001', 'lr: 0.')))).toBeNull();
    expect(extractRecord(line(VALID_TAIL.replace('Ret = 5.0', 'Ret = abc')))).toBeNull();
  });

  it('should return null when Seen is not 0 or 1', () => {
    expect(extractRecord(line(VALID_TAIL.replace('Seen=1', 'Seen=2')))).toBeNull();
  });

  it('should return null for a negative crash counter', () => {
    expect(extractRecord(line(VALID_TAIL.replace('Last Crash = 2', 'Last Crash = -2')))).toBeNull();
  });

  it('should return null without the dash before Iter', () => {
    expect(extractRecord('INFO Iter: ' + VALID_TAIL)).toBeNull();
  });

  it('should return null when no whitespace precedes the dash', () => {
    expect(extractRecord('x- Iter: ' + VALID_TAIL)).toBeNull();
    expect(extractRecord('INFO:trainer- Iter: ' + VALID_TAIL)).toBeNull();
  });
});

describe('createRecordExtractor', () => {
  it('should use the supplied grammar', () => {
    const grammar: LineGrammar = {
      name: 'always-empty',
      match: () => null,
    };
    const extract = createRecordExtractor(grammar);
    expect(extract(line())).toBeNull();
  });

  it('should default to the Iter grammar', () => {
    const extract = createRecordExtractor();
    expect(extract(line())?.step).toBe(100);
  });
});

describe('grammar registry', () => {
  it('should resolve the built-in grammar by name', () => {
    expect(getLineGrammar('iter-v1')).toBe(ITER_LINE_GRAMMAR);
  });

  it('should throw UnknownGrammarError for an unknown name', () => {
    expect(() => getLineGrammar('nope')).toThrow(UnknownGrammarError);
  });

  it('should list registered grammars', () => {
    registerLineGrammar({ name: 'test-registry-grammar', match: () => null });
    expect(listLineGrammars()).toContain('iter-v1');
    expect(listLineGrammars()).toContain('test-registry-grammar');
  });
});
