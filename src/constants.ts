// Monoisotopic masses (IUPAC 2016)
export const MONOISOTOPIC_MASSES: Readonly<Record<string, number>> = {
  C: 12.0,
  H: 1.00782503223,
  N: 14.0030740048,
  O: 15.9949146223,
  P: 30.9737619985,
  S: 31.9720711744,
};

// Heavy isotope masses keyed by element, then mass number
export const ISOTOPE_MASSES: Readonly<Record<string, Readonly<Record<number, number>>>> = {
  H: { 2: 2.01410177812 },
  C: { 13: 13.00335483507 },
  N: { 15: 15.0001088989 },
  O: { 18: 17.9991596129 },
};

export const PROTON_MASS = 1.007276466812;

// Ion carriers other than the proton
export const SODIUM_ION_MASS = 22.98976928;
export const AMMONIUM_ION_MASS = 18.03383;
export const ACETATE_ION_MASS = 59.013851;
export const FORMATE_ION_MASS = 44.998201;

export const MIN_CHARGE = 1;
export const MAX_CHARGE = 5;
