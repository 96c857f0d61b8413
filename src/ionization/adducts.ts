import { uniq } from 'es-toolkit';
import type { AdductDef, ChargeSign, LipidClassDef, Polarity } from 'types';
import {
  ACETATE_ION_MASS,
  AMMONIUM_ION_MASS,
  FORMATE_ION_MASS,
  PROTON_MASS,
  SODIUM_ION_MASS,
} from 'src/constants';
import { ConfigurationError } from 'src/errors';

/*
 * massDelta is what the adduct adds to the neutral mass beyond the z protons
 * computeMz accounts for. A carrier ion replaces one of those protons.
 */
const ADDUCT_DEFS: AdductDef[] = [
  { name: '[M+H]+', sign: 1, massDelta: 0 },
  { name: '[M-H]-', sign: -1, massDelta: 0 },
  { name: '[M+Na]+', sign: 1, massDelta: SODIUM_ION_MASS - PROTON_MASS, carrier: 'Na' },
  { name: '[M+NH4]+', sign: 1, massDelta: AMMONIUM_ION_MASS - PROTON_MASS, carrier: 'NH4' },
  { name: '[M+CH3COO]-', sign: -1, massDelta: ACETATE_ION_MASS + PROTON_MASS, carrier: 'CH3COO' },
  { name: '[M+HCOO]-', sign: -1, massDelta: FORMATE_ION_MASS + PROTON_MASS, carrier: 'HCOO' },
];

export const ADDUCTS: readonly AdductDef[] = Object.freeze(ADDUCT_DEFS.map((adduct) => Object.freeze(adduct)));

export interface IonState {
  readonly adduct: AdductDef;
  readonly charge: number;
}

function adductKey(name: string): string {
  return name
    .replace(/[[\]\s]/g, '')
    .replace(/[+-]$/, '')
    .toUpperCase();
}

/**
 * Look up a catalog adduct. "[M+H]+", "[M+H]" and "M+H" all name the same one.
 */
export function findAdduct(name: string, catalog: readonly AdductDef[] = ADDUCTS): AdductDef | undefined {
  const key = adductKey(name);
  return catalog.find((adduct) => adductKey(adduct.name) === key);
}

export function getAdduct(name: string, catalog: readonly AdductDef[] = ADDUCTS): AdductDef {
  const adduct = findAdduct(name, catalog);
  if (!adduct) {
    throw new ConfigurationError(
      `Unknown adduct "${name}" (known: ${catalog.map((entry) => entry.name).join(', ')})`,
    );
  }
  return adduct;
}

export function adductPolarity(adduct: AdductDef): Polarity {
  return adduct.sign > 0 ? 'positive' : 'negative';
}

export function defaultProductAdduct(sign: ChargeSign): AdductDef {
  return getAdduct(sign > 0 ? '[M+H]+' : '[M-H]-');
}

export function computeMz(neutralMass: number, adduct: AdductDef, charge: number): number {
  return (neutralMass + adduct.massDelta + adduct.sign * charge * PROTON_MASS) / charge;
}

/**
 * Charge-specific notation: "[M+H]1+", "[M-2H]2-", "[M+H+Na]2+".
 */
export function formatAdduct(adduct: AdductDef, charge: number): string {
  const protons = adduct.carrier ? charge - 1 : charge;
  let core = 'M';
  if (protons > 0) {
    core += `${adduct.sign > 0 ? '+' : '-'}${protons > 1 ? protons : ''}H`;
  }
  if (adduct.carrier) {
    core += `+${adduct.carrier}`;
  }
  return `[${core}]${charge}${adduct.sign > 0 ? '+' : '-'}`;
}

/**
 * A charge state must sit in the class range; negative ions are further
 * bounded by the number of sites able to hold a negative charge.
 */
export function isChargeAllowed(classDef: LipidClassDef, sign: ChargeSign, charge: number): boolean {
  if (!Number.isInteger(charge)) return false;
  if (charge < classDef.charge.min || charge > classDef.charge.max) return false;
  return sign > 0 || charge <= classDef.maxNegativeCharge;
}

/**
 * Valid (adduct, charge) pairs, charge ascending then adduct order.
 */
export function* expandIonStates(
  classDef: LipidClassDef,
  charges: readonly number[],
  adducts: readonly AdductDef[],
): Generator<IonState, void, undefined> {
  const ordered = uniq(charges).sort((a, b) => a - b);
  for (const charge of ordered) {
    for (const adduct of adducts) {
      if (isChargeAllowed(classDef, adduct.sign, charge)) {
        yield { adduct, charge };
      }
    }
  }
}
