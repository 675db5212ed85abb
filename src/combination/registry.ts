/**
 * @fileoverview Combination rules by name.
 *
 * The CLI and evidence documents refer to rules by a stable name. Binary
 * rules are applied to N sources as a left fold in source order; PCR6 is
 * applied to all sources at once.
 */

import { ValidationError } from '../core/errors.js';
import type { MassFunction } from '../core/mass_function.js';
import { combineDuboisPrade, combineYager, combineZhang } from './advanced.js';
import { combineConjunctive, combineDisjunctive, combineMultiple, type CombinationRule } from './basic.js';
import { combineBold, combineCautious } from './canonical.js';
import { combinePcr5, combinePcr6 } from './pcr.js';

export type RuleName =
  | 'conjunctive'
  | 'dempster'
  | 'disjunctive'
  | 'yager'
  | 'dubois-prade'
  | 'zhang'
  | 'pcr5'
  | 'pcr6'
  | 'cautious'
  | 'bold';

export interface RuleDescriptor {
  readonly name: RuleName;
  readonly description: string;
  /** Whether folding over sources gives the same result in any grouping. */
  readonly associative: boolean;
  readonly combine: (sources: readonly MassFunction[]) => MassFunction;
}

const fold = (rule: CombinationRule) => (sources: readonly MassFunction[]): MassFunction =>
  combineMultiple(sources, rule);

const RULES: Record<RuleName, RuleDescriptor> = {
  conjunctive: {
    name: 'conjunctive',
    description: 'Unnormalized conjunctive rule; conflict stays on the empty set',
    associative: true,
    combine: fold((m1, m2) => combineConjunctive(m1, m2, { normalize: false })),
  },
  dempster: {
    name: 'dempster',
    description: "Dempster's rule: conjunctive combination, conflict normalized away",
    associative: true,
    combine: fold((m1, m2) => combineConjunctive(m1, m2)),
  },
  disjunctive: {
    name: 'disjunctive',
    description: 'Disjunctive rule: products go to the union of focal sets',
    associative: true,
    combine: fold(combineDisjunctive),
  },
  yager: {
    name: 'yager',
    description: "Yager's rule: conflict is moved to the whole frame",
    associative: false,
    combine: fold(combineYager),
  },
  'dubois-prade': {
    name: 'dubois-prade',
    description: 'Dubois-Prade rule: conflicting products go to the union of the pair',
    associative: false,
    combine: fold(combineDuboisPrade),
  },
  zhang: {
    name: 'zhang',
    description: "Zhang's rule: conflict shared among the non-frame focal sets",
    associative: false,
    combine: fold((m1, m2) => combineZhang(m1, m2)),
  },
  pcr5: {
    name: 'pcr5',
    description: 'PCR5: conflict returned to the conflicting pair in proportion to their masses',
    associative: false,
    combine: fold(combinePcr5),
  },
  pcr6: {
    name: 'pcr6',
    description: 'PCR6: N-source proportional conflict redistribution',
    associative: false,
    combine: (sources) => combinePcr6(sources),
  },
  cautious: {
    name: 'cautious',
    description: 'Cautious rule: minimum of conjunctive weights (idempotent)',
    associative: true,
    combine: fold((m1, m2) => combineCautious(m1, m2)),
  },
  bold: {
    name: 'bold',
    description: 'Bold rule: maximum of conjunctive weights (idempotent)',
    associative: true,
    combine: fold((m1, m2) => combineBold(m1, m2)),
  },
};

export function listRules(): RuleDescriptor[] {
  return Object.values(RULES);
}

export function isRuleName(value: string): value is RuleName {
  return Object.keys(RULES).includes(value);
}

/**
 * @throws ValidationError for an unknown rule name
 */
export function getRule(name: string): RuleDescriptor {
  if (!isRuleName(name)) {
    throw new ValidationError(`Unknown combination rule "${name}". Available: ${Object.keys(RULES).join(', ')}`);
  }
  return RULES[name];
}

/**
 * Combines all sources with the named rule.
 *
 * @throws ValidationError for an unknown rule or an empty source list
 */
export function combineSources(sources: readonly MassFunction[], ruleName: string): MassFunction {
  return getRule(ruleName).combine(sources);
}
