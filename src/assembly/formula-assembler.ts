import type { AtomCount, LipidClassDef, Structure } from 'types';
import { FormulaError } from 'src/errors';
import { addCounts, findNegativeElement, parseFormula, scaleCount } from 'src/utils/atom-count';
import { getStructureFormula } from 'src/enumeration/building-blocks';

// One amide bond between the long-chain base and the N-acyl chain
const CONDENSATION_WATER = scaleCount(parseFormula('H2O'), -1);

export interface Species {
  readonly name: string;
  readonly classId: string;
  readonly formula: AtomCount;
  readonly lcb: Structure;
  readonly fa: Structure;
}

export function speciesName(classDef: LipidClassDef, lcb: Structure, fa: Structure): string {
  return `${classDef.id} ${lcb.name}/${fa.name}`;
}

/**
 * Neutral precursor composition: headgroup + LCB + fatty acid - H2O.
 * Throws FormulaError rather than clamping when any element goes negative.
 */
export function assembleSpecies(classDef: LipidClassDef, lcb: Structure, fa: Structure): Species {
  const name = speciesName(classDef, lcb, fa);
  const formula = addCounts(classDef.headgroup, getStructureFormula(lcb), getStructureFormula(fa), CONDENSATION_WATER);

  const negative = findNegativeElement(formula);
  if (negative !== undefined) {
    throw new FormulaError(`${name} needs a negative ${negative} count (${formula[negative]})`, negative);
  }

  return Object.freeze({ name, classId: classDef.id, formula: Object.freeze(formula), lcb, fa });
}
