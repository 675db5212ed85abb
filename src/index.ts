/**
 * @fileoverview evidence-algebra
 *
 * Dempster-Shafer evidence theory: frames of discernment, mass functions
 * and their measures, combination rules, discounting operators and the
 * JSON evidence document format.
 *
 * @example
 * ```typescript
 * import { combineConjunctive, createMassFunction } from 'evidence-algebra';
 *
 * const radar = createMassFunction({ '{car}': 0.6, '{car,truck}': 0.4 });
 * const camera = createMassFunction({ '{truck}': 0.3, '{car,truck}': 0.7 });
 * combineConjunctive(radar, camera).belief(['car']);
 * ```
 *
 * @packageDocumentation
 */

export { EVIDENCE_ALGEBRA_VERSION } from './version.js';

export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  resolveEngineConfig,
  type ConfigOptions,
  type EngineConfig,
} from './config/engine_config.js';

export {
  DogmaticInputError,
  EvidenceError,
  FrameMismatchError,
  InvalidPartitionError,
  InvalidReliabilityError,
  TotalConflictError,
  ValidationError,
  isEvidenceError,
  type DogmaticReason,
  type EvidenceErrorKind,
} from './core/errors.js';

export { Frame, toFrame, type FrameInput } from './core/frame.js';

export {
  EMPTY_SUBSET,
  cardinality,
  formatFocalSet,
  intersect,
  intersects,
  isSubsetOf,
  parseFocalSet,
  subsetsOf,
  supersetsOf,
  union,
  type Subset,
} from './core/subset.js';

export {
  MassFunction,
  createBayesianMassFunction,
  createMassFunction,
  createRawMassFunction,
  createVacuousMassFunction,
  type FocalElement,
  type FocalKey,
  type Hypothesis,
  type MassEntry,
  type MassFunctionOptions,
  type MassInput,
} from './core/mass_function.js';

export * from './combination/index.js';
export * from './discounting/index.js';

export {
  DOCUMENT_SUM_TOLERANCE,
  EvidenceDocumentSchema,
  loadEvidenceDocument,
  readEvidenceDocument,
  serializeEvidenceDocument,
  validateEvidenceDocument,
  writeEvidenceDocument,
  type DocumentValidation,
  type EvidenceDocument,
  type EvidenceSource,
  type LoadedEvidence,
} from './evidence/document.js';

export {
  createSeededRandom,
  generateEvidenceDocument,
  generateRandomMassFunction,
  type GenerateDocumentOptions,
  type RandomMassOptions,
  type RandomSource,
} from './evidence/generator.js';
