import type {
  AdductDef,
  FASpec,
  IsotopeLabelSpec,
  LabelType,
  LCBSpec,
  LipidClassDef,
  Polarity,
  TransitionRecord,
} from 'types';
import { MAX_CHARGE, MIN_CHARGE } from 'src/constants';
import { ConfigurationError, FormulaError, RuleApplicationSkip } from 'src/errors';
import { assembleSpecies, type Species } from 'src/assembly/formula-assembler';
import { enumerateFattyAcids, enumerateLcbs } from 'src/enumeration/building-blocks';
import { applyFragmentRules, appliesToPolarity, type ProductIon } from 'src/fragmentation/rule-engine';
import {
  adductPolarity,
  computeMz,
  defaultProductAdduct,
  expandIonStates,
  formatAdduct,
  isChargeAllowed,
  type IonState,
} from 'src/ionization/adducts';
import { formatHeavyAdduct, isLabelEligible } from 'src/labeling/isotope-labels';
import { createTransitionRecord } from 'src/transitions/transition-table';
import { formatFormula } from 'src/utils/atom-count';
import { canCarrySubstitutions, getExactMass, getSubstitutionShift } from 'src/utils/exact-mass';

export interface TransitionRequest {
  lipidClass: LipidClassDef;
  lcb: LCBSpec;
  fattyAcid: FASpec;
  charges: readonly number[];
  adducts: readonly AdductDef[];
  /** Defaults to [M+H]+ for positive precursors and [M-H]- for negative ones. */
  productAdducts?: readonly AdductDef[];
  isotopeLabel?: IsotopeLabelSpec;
}

export interface SkipReport {
  species: string;
  product?: string;
  error: FormulaError | RuleApplicationSkip;
}

export interface GenerationOptions {
  signal?: AbortSignal;
  maxRows?: number;
  onSkip?: (report: SkipReport) => void;
}

export type GenerationStatus = 'complete' | 'cancelled' | 'truncated';

export interface GenerationSummary {
  status: GenerationStatus;
  emitted: number;
  skipped: number;
}

export interface GenerationResult extends GenerationSummary {
  records: TransitionRecord[];
}

type Path = readonly (string | number)[];

function requireCount(value: number, path: Path, min = 0): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`Expected an integer >= ${min}, got ${value}`, path);
  }
}

function requireCarbonRange(range: { min: number; max: number }, path: Path): void {
  requireCount(range.min, [...path, 'min'], 1);
  requireCount(range.max, [...path, 'max'], 1);
  if (range.min > range.max) {
    throw new ConfigurationError(`min (${range.min}) exceeds max (${range.max})`, path);
  }
}

function requireNonEmptyCounts(values: readonly number[], path: Path): void {
  if (values.length === 0) {
    throw new ConfigurationError('At least one value is required', path);
  }
  values.forEach((value, index) => requireCount(value, [...path, index]));
}

/**
 * Reject structurally invalid requests before any enumeration starts.
 */
export function validateRequest(request: TransitionRequest): void {
  const { lcb, fattyAcid } = request;

  requireCarbonRange(lcb.carbons, ['lcb', 'carbons']);
  requireNonEmptyCounts(lcb.unsaturations, ['lcb', 'unsaturations']);
  requireNonEmptyCounts(lcb.hydroxylations, ['lcb', 'hydroxylations']);
  if (lcb.baseHydroxyls !== undefined) requireCount(lcb.baseHydroxyls, ['lcb', 'baseHydroxyls']);

  requireCarbonRange(fattyAcid.carbons, ['fattyAcid', 'carbons']);
  requireCount(fattyAcid.maxUnsaturation, ['fattyAcid', 'maxUnsaturation']);

  if (request.charges.length === 0) {
    throw new ConfigurationError('At least one charge state is required', ['charges']);
  }
  request.charges.forEach((charge, index) => {
    if (!Number.isInteger(charge) || charge < MIN_CHARGE || charge > MAX_CHARGE) {
      throw new ConfigurationError(`Charge must be an integer in ${MIN_CHARGE}..${MAX_CHARGE}, got ${charge}`, [
        'charges',
        index,
      ]);
    }
  });

  if (request.adducts.length === 0) {
    throw new ConfigurationError('At least one adduct is required', ['adducts']);
  }
  if (request.productAdducts !== undefined && request.productAdducts.length === 0) {
    throw new ConfigurationError('Product adduct list is empty', ['productAdducts']);
  }

  const label = request.isotopeLabel;
  if (label) {
    if (label.keywords.length === 0) {
      throw new ConfigurationError('Isotope labeling needs at least one product keyword', [
        'isotopeLabel',
        'keywords',
      ]);
    }
    if (label.substitutions.length === 0) {
      throw new ConfigurationError('Isotope label substitutes no atoms', ['isotopeLabel', 'substitutions']);
    }
    label.substitutions.forEach((sub, index) =>
      requireCount(sub.count, ['isotopeLabel', 'substitutions', index, 'count'], 1),
    );
  }
}

function productIonStates(
  classDef: LipidClassDef,
  product: ProductIon,
  precursor: IonState,
  productAdducts: readonly AdductDef[] | undefined,
): IonState[] {
  if (product.rule.retainsPrecursorIon) return [precursor];

  const sign = precursor.adduct.sign;
  const adducts = (productAdducts ?? [defaultProductAdduct(sign)]).filter((adduct) => adduct.sign === sign);
  const charges = [...product.rule.charges].sort((a, b) => a - b);
  const states: IonState[] = [];
  for (const charge of charges) {
    if (charge > precursor.charge || !isChargeAllowed(classDef, sign, charge)) continue;
    for (const adduct of adducts) {
      states.push({ adduct, charge });
    }
  }
  return states;
}

function ruleFilter(states: readonly IonState[]): Polarity | undefined {
  const polarities = new Set(states.map((state) => adductPolarity(state.adduct)));
  if (polarities.size !== 1) return undefined;
  return polarities.has('positive') ? 'positive' : 'negative';
}

function describeSkip(report: SkipReport): string {
  const target = report.product ? `${report.species} / ${report.product}` : report.species;
  return `[transitions] skipped ${target}: ${report.error.message}`;
}

/**
 * Lazily produce the transition rows of a request. Validation runs at call
 * time; the returned generator's return value summarizes the run.
 *
 * Rows come in species order (LCB outer, fatty acid inner), then fragment rule
 * order, precursor charge, precursor adduct, product charge, product adduct,
 * and Light before Heavy. A species or product whose formula cannot be built
 * is skipped and reported through `onSkip`.
 */
export function streamTransitions(
  request: TransitionRequest,
  options: GenerationOptions = {},
): Generator<TransitionRecord, GenerationSummary, undefined> {
  validateRequest(request);
  if (options.maxRows !== undefined) requireCount(options.maxRows, ['maxRows']);

  const classDef = request.lipidClass;
  const label = request.isotopeLabel;
  const ionStates = [...expandIonStates(classDef, request.charges, request.adducts)];
  const polarity = ruleFilter(ionStates);
  const labelShift = label ? getSubstitutionShift(label.substitutions) : 0;

  return (function* run(): Generator<TransitionRecord, GenerationSummary, undefined> {
    let emitted = 0;
    let skipped = 0;

    const report = (entry: SkipReport) => {
      skipped += 1;
      if (process.env.VERBOSE) console.warn(describeSkip(entry));
      options.onSkip?.(entry);
    };

    const halt = (): GenerationStatus | undefined => {
      if (options.signal?.aborted) return 'cancelled';
      if (options.maxRows !== undefined && emitted >= options.maxRows) return 'truncated';
      return undefined;
    };

    // A formula too small for the label still gets a heavy mass: light mass plus the label shift.
    const heavyMass = (formula: Species['formula'], lightMass: number, target: string): number | undefined => {
      if (!label) return undefined;
      if (canCarrySubstitutions(formula, label.substitutions)) {
        return getExactMass(formula, label.substitutions);
      }
      if (process.env.VERBOSE) {
        console.debug(`[transitions] ${target} has too few atoms for ${label.token}, shifting by ${labelShift}`);
      }
      return lightMass + labelShift;
    };

    if (ionStates.length === 0) {
      if (process.env.VERBOSE) {
        console.warn(`[transitions] no charge/adduct combination is valid for ${classDef.id}`);
      }
      return { status: 'complete', emitted, skipped };
    }

    for (const lcb of enumerateLcbs(request.lcb, classDef.lcbBaseHydroxyls)) {
      for (const fa of enumerateFattyAcids(request.fattyAcid)) {
        if (options.signal?.aborted) return { status: 'cancelled', emitted, skipped };

        let species: Species;
        try {
          species = assembleSpecies(classDef, lcb, fa);
        } catch (error) {
          if (!(error instanceof FormulaError)) throw error;
          report({ species: `${classDef.id} ${lcb.name}/${fa.name}`, error });
          continue;
        }

        const moleculeFormula = formatFormula(species.formula);
        const precursorMass = getExactMass(species.formula);
        const heavyPrecursorMass = heavyMass(species.formula, precursorMass, species.name);

        for (const outcome of applyFragmentRules(species, classDef, polarity)) {
          if (!outcome.ok) {
            report({ species: species.name, product: outcome.skip.rule, error: outcome.skip });
            continue;
          }

          const product = outcome.product;
          const productFormula = formatFormula(product.formula);
          const productMass = getExactMass(product.formula);
          const eligible = label !== undefined && isLabelEligible(product.name, label.keywords);
          const heavyProductMass = eligible
            ? heavyMass(product.formula, productMass, `${species.name} / ${product.name}`)
            : undefined;

          for (const precursor of ionStates) {
            const precursorPolarity = adductPolarity(precursor.adduct);
            if (!appliesToPolarity(product.rule.polarity, precursorPolarity)) continue;

            const sign = precursor.adduct.sign;
            const precursorAdduct = formatAdduct(precursor.adduct, precursor.charge);

            for (const ion of productIonStates(classDef, product, precursor, request.productAdducts)) {
              const rows: [LabelType | undefined, number, number][] = [
                [eligible ? 'light' : undefined, precursorMass, productMass],
              ];
              if (heavyPrecursorMass !== undefined && heavyProductMass !== undefined) {
                rows.push(['heavy', heavyPrecursorMass, heavyProductMass]);
              }

              for (const [rowLabel, neutralPrecursor, neutralProduct] of rows) {
                const stop = halt();
                if (stop) return { status: stop, emitted, skipped };

                yield createTransitionRecord({
                  moleculeListName: classDef.id,
                  molecule: species.name,
                  moleculeFormula,
                  precursorAdduct:
                    rowLabel === 'heavy' && label ? formatHeavyAdduct(precursorAdduct, label.token) : precursorAdduct,
                  precursorMz: computeMz(neutralPrecursor, precursor.adduct, precursor.charge),
                  precursorCharge: sign * precursor.charge,
                  productName: product.name,
                  productFormula,
                  productMz: computeMz(neutralProduct, ion.adduct, ion.charge),
                  productCharge: sign * ion.charge,
                  ...(rowLabel ? { label: rowLabel } : {}),
                });
                emitted += 1;
              }
            }
          }
        }
      }
    }

    return { status: 'complete', emitted, skipped };
  })();
}

/**
 * Eager form of streamTransitions.
 */
export function generateTransitions(request: TransitionRequest, options: GenerationOptions = {}): GenerationResult {
  const iterator = streamTransitions(request, options);
  const records: TransitionRecord[] = [];
  let step = iterator.next();
  while (!step.done) {
    records.push(step.value);
    step = iterator.next();
  }
  return { records, ...step.value };
}
