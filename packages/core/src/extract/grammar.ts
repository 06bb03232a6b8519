/**
 * Line grammars
 *
 * A grammar turns one raw log line into a LogRecord, or rejects it.
 * Grammars are registered by name so a run can pick the format its
 * producer writes.
 */

import { UnknownGrammarError } from '../errors.js';
import type { LogRecord } from '../types.js';

/**
 * Named line format
 */
export interface LineGrammar {
  readonly name: string;
  /** Returns null when the line does not match; never throws */
  match(line: string): LogRecord | null;
}

const NUM = String.raw`[+-]?\d+(?:\.\d+)?`;

/**
 * `<prefix> - Iter: 100/3 A1-B2 - Rand Eps: 0.10 lr: 0.001 Ret = 5.0 Last Crash = 2 t=0.05 SF = 1.0 Seen=1 Reward: 50.0`
 */
const ITER_LINE_PATTERN = new RegExp(
  [
    String.raw`^\s*.*?\s-\s+Iter:\s+(?<step>\d+)\s*\/\s*(?<episode>\d+)\s+`,
    String.raw`(?<decision>[A-Z][0-9]-[A-Z][0-9])\s+-\s+`,
    String.raw`(?:Rand|Pred)\s+Eps:\s+(?<eps>${NUM})`,
    String.raw`\s+lr:\s+(?<lr>${NUM})`,
    String.raw`\s+Ret\s*=\s*(?<ret>${NUM})`,
    String.raw`\s+Last\s+Crash\s*=\s*(?<lastCrash>\d+)`,
    String.raw`\s+t=(?<t>${NUM})`,
    String.raw`\s+SF\s*=\s*(?<sf>${NUM})`,
    String.raw`\s+Seen=\s*(?<found>[01])`,
    String.raw`\s+Reward:\s*(?<reward>${NUM})`,
  ].join('')
);

function matchIterLine(line: string): LogRecord | null {
  const groups = ITER_LINE_PATTERN.exec(line)?.groups;
  if (!groups) {
    return null;
  }

  // Every group is mandatory, so a match fills them all
  const {
    step = '',
    episode = '',
    decision = '',
    eps = '',
    lr = '',
    ret = '',
    lastCrash = '',
    t = '',
    sf = '',
    found = '',
    reward = '',
  } = groups;

  return {
    step: Number.parseInt(step, 10),
    episode,
    decision,
    eps: Number.parseFloat(eps),
    learningRate: Number.parseFloat(lr),
    ret: Number.parseFloat(ret),
    lastCrash: Number.parseInt(lastCrash, 10),
    stepTime: Number.parseFloat(t),
    sf: Number.parseFloat(sf),
    found: found === '1',
    reward: Number.parseFloat(reward),
    text: { step, eps, learningRate: lr, ret, lastCrash, stepTime: t, sf, reward },
  };
}

/**
 * The harness's `Iter:` status line
 */
export const ITER_LINE_GRAMMAR: LineGrammar = {
  name: 'iter-v1',
  match: matchIterLine,
};

export const DEFAULT_GRAMMAR_NAME = ITER_LINE_GRAMMAR.name;

const grammars = new Map<string, LineGrammar>([[ITER_LINE_GRAMMAR.name, ITER_LINE_GRAMMAR]]);

/**
 * Register an additional grammar. A grammar with the same name is replaced.
 */
export function registerLineGrammar(grammar: LineGrammar): void {
  grammars.set(grammar.name, grammar);
}

export function listLineGrammars(): string[] {
  return [...grammars.keys()].sort();
}

/**
 * @throws UnknownGrammarError when no grammar has this name
 */
export function getLineGrammar(name: string): LineGrammar {
  const grammar = grammars.get(name);
  if (!grammar) {
    throw new UnknownGrammarError(name, listLineGrammars());
  }
  return grammar;
}
