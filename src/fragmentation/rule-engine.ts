import type { AtomCount, FragmentRule, LipidClassDef, Polarity, RulePolarity } from 'types';
import type { Species } from 'src/assembly/formula-assembler';
import { RuleApplicationSkip } from 'src/errors';
import { applyDelta, findNegativeElement } from 'src/utils/atom-count';
import { getStructureFormula } from 'src/enumeration/building-blocks';

export interface ProductIon {
  readonly rule: FragmentRule;
  readonly name: string;
  readonly formula: AtomCount;
}

export type FragmentOutcome =
  | { readonly ok: true; readonly product: ProductIon }
  | { readonly ok: false; readonly skip: RuleApplicationSkip };

const EMPTY: AtomCount = Object.freeze({});

export function appliesToPolarity(rulePolarity: RulePolarity, polarity: Polarity): boolean {
  return rulePolarity === 'both' || rulePolarity === polarity;
}

export function renderRuleName(template: string, species: Species): string {
  return template
    .replaceAll('{class}', species.classId)
    .replaceAll('{lcb}', species.lcb.name)
    .replaceAll('{fa}', species.fa.name);
}

function basisFormula(rule: FragmentRule, species: Species): AtomCount {
  switch (rule.basis) {
    case 'precursor':
      return species.formula;
    case 'lcb':
      return getStructureFormula(species.lcb);
    case 'fa':
      return getStructureFormula(species.fa);
    case 'headgroup':
      return EMPTY;
  }
}

export function applyFragmentRule(rule: FragmentRule, species: Species): FragmentOutcome {
  const name = renderRuleName(rule.name, species);
  const formula = applyDelta(basisFormula(rule, species), rule.delta);
  const negative = findNegativeElement(formula);
  if (negative !== undefined) {
    return { ok: false, skip: new RuleApplicationSkip(species.name, name, negative) };
  }
  return { ok: true, product: Object.freeze({ rule, name, formula: Object.freeze(formula) }) };
}

/**
 * Products of every rule of the class, in rule order. With `polarity` set,
 * rules for the other polarity are passed over without being evaluated.
 */
export function* applyFragmentRules(
  species: Species,
  classDef: LipidClassDef,
  polarity?: Polarity,
): Generator<FragmentOutcome, void, undefined> {
  for (const rule of classDef.fragments) {
    if (polarity !== undefined && !appliesToPolarity(rule.polarity, polarity)) continue;
    yield applyFragmentRule(rule, species);
  }
}
