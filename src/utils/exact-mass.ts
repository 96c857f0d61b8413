import type { AtomCount, IsotopeSubstitution } from 'types';
import { MONOISOTOPIC_MASSES } from 'src/constants';
import { FormulaError } from 'src/errors';

/**
 * Exact neutral mass of an elemental composition.
 *
 * Substituted atoms are priced at their heavy isotope mass and the remainder
 * of that element at the monoisotopic mass. Several substitutions may target
 * the same element (e.g. ¹³C and nothing else) as long as their total does not
 * exceed the atom count.
 */
export function getExactMass(
  counts: AtomCount,
  substitutions: readonly IsotopeSubstitution[] = [],
): number {
  const substituted: Record<string, number> = {};
  let mass = 0;

  for (const sub of substitutions) {
    if (sub.count <= 0) continue;
    const available = counts[sub.element] ?? 0;
    const used = (substituted[sub.element] ?? 0) + sub.count;
    if (used > available) {
      throw new FormulaError(
        `Cannot substitute ${used} ${sub.element} atoms with ${sub.massNumber}${sub.element}: only ${available} present`,
        sub.element,
      );
    }
    substituted[sub.element] = used;
    mass += sub.count * sub.mass;
  }

  for (const [element, n] of Object.entries(counts)) {
    if (n < 0) {
      throw new FormulaError(`Negative ${element} count (${n})`, element);
    }
    const atomMass = MONOISOTOPIC_MASSES[element];
    if (atomMass === undefined) {
      throw new FormulaError(`No monoisotopic mass for element ${element}`, element);
    }
    mass += (n - (substituted[element] ?? 0)) * atomMass;
  }
  return mass;
}

/**
 * Whether every substitution finds enough atoms of its element in `counts`.
 */
export function canCarrySubstitutions(counts: AtomCount, substitutions: readonly IsotopeSubstitution[]): boolean {
  const needed: Record<string, number> = {};
  for (const sub of substitutions) {
    needed[sub.element] = (needed[sub.element] ?? 0) + Math.max(sub.count, 0);
  }
  return Object.entries(needed).every(([element, n]) => n <= (counts[element] ?? 0));
}

/**
 * Mass difference a set of substitutions adds to any formula that can hold it.
 */
export function getSubstitutionShift(substitutions: readonly IsotopeSubstitution[]): number {
  let shift = 0;
  for (const sub of substitutions) {
    const light = MONOISOTOPIC_MASSES[sub.element];
    if (light === undefined) {
      throw new FormulaError(`No monoisotopic mass for element ${sub.element}`, sub.element);
    }
    shift += sub.count * (sub.mass - light);
  }
  return shift;
}
