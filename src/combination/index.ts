export {
  combineConjunctive,
  combineDempster,
  combineDisjunctive,
  combineMultiple,
  conflictBetween,
  type CombinationResult,
  type CombinationRule,
  type ConjunctiveOptions,
} from './basic.js';
export {
  combineDuboisPrade,
  combineYager,
  combineZhang,
  type ZhangOptions,
  type ZhangRedistribution,
} from './advanced.js';
export { combinePcr5, combinePcr6, type Pcr6ConflictHandling, type Pcr6Options } from './pcr.js';
export {
  canonicalDecomposition,
  combineBold,
  combineCautious,
  commonalityFunction,
  massFromWeights,
  weightFunction,
  type ReconstructionOptions,
  type SimpleSupportFunction,
  type WeightFunction,
} from './canonical.js';
export {
  combineSources,
  getRule,
  isRuleName,
  listRules,
  type RuleDescriptor,
  type RuleName,
} from './registry.js';
