// Core types for transition generation

/**
 * Elemental composition, element symbol -> atom count.
 * Absent elements count as zero. Counts are never negative once a formula
 * leaves the assembler or the fragmentation engine.
 */
export type AtomCount = Readonly<Record<string, number>>;

/**
 * Signed element changes applied to an AtomCount (e.g. -C11H17NO8 for a
 * dehydrated sialic acid loss).
 */
export type AtomDelta = Readonly<Record<string, number>>;

export type Polarity = 'positive' | 'negative';

export type ChargeSign = 1 | -1;

export interface IntRange {
  min: number;
  max: number;
}

/**
 * Long-chain base family to enumerate.
 * `hydroxylations` are degrees beyond the class baseline, so {0} on a
 * dihydroxy class gives the ";2" bases.
 */
export interface LCBSpec {
  carbons: IntRange;
  unsaturations: readonly number[];
  hydroxylations: readonly number[];
  baseHydroxyls?: number; // overrides the lipid class baseline
}

export type ChainParity = 'even' | 'odd' | 'both';

/**
 * N-acyl chain family to enumerate.
 */
export interface FASpec {
  carbons: IntRange;
  maxUnsaturation: number;
  parity: ChainParity;
}

export type StructureKind = 'lcb' | 'fa';

/**
 * One concrete building block. Immutable once enumerated.
 */
export interface Structure {
  readonly kind: StructureKind;
  readonly carbons: number;
  readonly unsaturation: number;
  readonly hydroxyls: number; // total hydroxyl count (LCB); 0 for plain fatty acids
  readonly name: string; // "18:1;2", "16:0"
}

export type FragmentBasis = 'precursor' | 'lcb' | 'fa' | 'headgroup';

export type RulePolarity = Polarity | 'both';

/**
 * Declarative product ion rule.
 * The product formula is the basis formula plus `delta`; for the
 * 'headgroup' basis the delta is the complete fragment formula.
 */
export interface FragmentRule {
  readonly name: string; // may contain {class}, {lcb} and {fa}
  readonly basis: FragmentBasis;
  readonly delta: AtomDelta;
  readonly polarity: RulePolarity;
  readonly charges: readonly number[]; // product charge magnitudes
  readonly retainsPrecursorIon: boolean; // product keeps precursor adduct and charge
}

export type LipidFamily = 'ceramide' | 'sphingomyelin' | 'glycosphingolipid';

export interface LipidClassDef {
  readonly id: string;
  readonly family: LipidFamily;
  readonly headgroup: AtomCount;
  readonly sialicAcids: number;
  readonly acidicGroups: number; // sulfate/phosphate sites able to carry a negative charge
  readonly charge: Readonly<IntRange>;
  readonly maxNegativeCharge: number;
  readonly recommendedCharges: readonly number[];
  readonly lcbBaseHydroxyls: number;
  readonly defaultIsotopeLabel: string;
  readonly description: string;
  readonly massRange: string;
  readonly fragments: readonly FragmentRule[];
}

/**
 * Ionization species. The adduct carries one charge on `carrier` when set;
 * every other charge is a proton added (positive) or removed (negative).
 */
export interface AdductDef {
  readonly name: string;
  readonly sign: ChargeSign;
  readonly massDelta: number;
  readonly carrier?: string;
}

export interface IsotopeSubstitution {
  readonly element: string;
  readonly massNumber: number;
  readonly mass: number;
  readonly count: number;
}

export interface IsotopeLabelSpec {
  readonly token: string; // e.g. 'M2DN15', inserted into heavy adduct notation
  readonly substitutions: readonly IsotopeSubstitution[];
  readonly keywords: readonly string[];
}

export type LabelType = 'light' | 'heavy';

export interface TransitionRecord {
  readonly moleculeListName: string;
  readonly molecule: string;
  readonly moleculeFormula: string;
  readonly precursorAdduct: string;
  readonly precursorMz: number;
  readonly precursorCharge: number;
  readonly productName: string;
  readonly productFormula: string;
  readonly productMz: number;
  readonly productCharge: number;
  readonly label?: LabelType;
}
