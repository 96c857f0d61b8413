export {
  generateTransitions,
  streamTransitions,
  validateRequest,
} from 'src/transitions/transition-generator';
export type {
  GenerationOptions,
  GenerationResult,
  GenerationStatus,
  GenerationSummary,
  SkipReport,
  TransitionRequest,
} from 'src/transitions/transition-generator';
export { TRANSITION_COLUMNS, createTransitionRecord, toTableRow, toTableRows } from 'src/transitions/transition-table';
export type { TableRow, TableRowOptions, TransitionColumn } from 'src/transitions/transition-table';
export {
  DEFAULT_GENERATION_CONFIG,
  generationConfigSchema,
  resolveGenerationConfig,
} from 'src/config/generation-config';
export type { GenerationConfig, GenerationConfigInput } from 'src/config/generation-config';
export {
  createLipidClassRegistry,
  getDefaultRegistry,
  getLipidClass,
  listLipidClasses,
  loadLipidClassRegistry,
} from 'src/registry/lipid-class-registry';
export type { LipidClassCatalog, LipidClassRegistry } from 'src/registry/lipid-class-registry';
export {
  createStructure,
  enumerateFattyAcids,
  enumerateLcbs,
  getStructureFormula,
  parseStructureName,
} from 'src/enumeration/building-blocks';
export { assembleSpecies } from 'src/assembly/formula-assembler';
export type { Species } from 'src/assembly/formula-assembler';
export { applyFragmentRule, applyFragmentRules } from 'src/fragmentation/rule-engine';
export type { FragmentOutcome, ProductIon } from 'src/fragmentation/rule-engine';
export {
  ADDUCTS,
  computeMz,
  expandIonStates,
  findAdduct,
  formatAdduct,
  getAdduct,
  isChargeAllowed,
} from 'src/ionization/adducts';
export type { IonState } from 'src/ionization/adducts';
export {
  DEFAULT_LABEL_KEYWORDS,
  createIsotopeLabel,
  formatHeavyAdduct,
  isLabelEligible,
  parseIsotopeLabel,
  parseLabelKeywords,
} from 'src/labeling/isotope-labels';
export { formatFormula, parseFormula, parseFormulaDelta } from 'src/utils/atom-count';
export { canCarrySubstitutions, getExactMass, getSubstitutionShift } from 'src/utils/exact-mass';
export { ConfigurationError, FormulaError, RuleApplicationSkip, TransitionEngineError } from 'src/errors';
export type * from 'types';
