import { range, uniq } from 'es-toolkit';
import type { AtomCount, ChainParity, FASpec, LCBSpec, Structure, StructureKind } from 'types';
import { ConfigurationError } from 'src/errors';

const STRUCTURE_NAME_RE = /^(\d+):(\d+)(?:;(\d+))?$/;

function ascendingSet(values: readonly number[]): number[] {
  return uniq(values).sort((a, b) => a - b);
}

function inclusiveRange(min: number, max: number): number[] {
  return min > max ? [] : range(min, max + 1);
}

function matchesParity(carbons: number, parity: ChainParity): boolean {
  if (parity === 'both') return true;
  return parity === 'even' ? carbons % 2 === 0 : carbons % 2 !== 0;
}

export function lcbName(carbons: number, unsaturation: number, hydroxyls: number): string {
  return `${carbons}:${unsaturation};${hydroxyls}`;
}

export function fattyAcidName(carbons: number, unsaturation: number, hydroxyls = 0): string {
  return hydroxyls > 0 ? `${carbons}:${unsaturation};${hydroxyls}` : `${carbons}:${unsaturation}`;
}

export function createStructure(
  kind: StructureKind,
  carbons: number,
  unsaturation: number,
  hydroxyls: number,
): Structure {
  const name =
    kind === 'lcb' ? lcbName(carbons, unsaturation, hydroxyls) : fattyAcidName(carbons, unsaturation, hydroxyls);
  return Object.freeze({ kind, carbons, unsaturation, hydroxyls, name });
}

/**
 * Long-chain bases with baseHydroxyls + each permitted extra hydroxylation.
 * Iterating the result again restarts the enumeration.
 */
export function enumerateLcbs(spec: LCBSpec, baseHydroxyls = 2): Iterable<Structure> {
  const base = spec.baseHydroxyls ?? baseHydroxyls;
  const unsaturations = ascendingSet(spec.unsaturations);
  const hydroxylations = ascendingSet(spec.hydroxylations);

  return {
    *[Symbol.iterator]() {
      for (const carbons of inclusiveRange(spec.carbons.min, spec.carbons.max)) {
        for (const unsaturation of unsaturations) {
          for (const extra of hydroxylations) {
            yield createStructure('lcb', carbons, unsaturation, base + extra);
          }
        }
      }
    },
  };
}

/**
 * Fatty acids within the carbon range, unsaturation 0..maxUnsaturation and
 * the parity filter. Parity is a plain odd/even predicate on carbon count.
 */
export function enumerateFattyAcids(spec: FASpec): Iterable<Structure> {
  return {
    *[Symbol.iterator]() {
      for (const carbons of inclusiveRange(spec.carbons.min, spec.carbons.max)) {
        if (!matchesParity(carbons, spec.parity)) continue;
        for (const unsaturation of inclusiveRange(0, spec.maxUnsaturation)) {
          yield createStructure('fa', carbons, unsaturation, 0);
        }
      }
    },
  };
}

/**
 * Elemental contribution before the amide condensation:
 * LCB CnH(2n+3-2u)NO(h), fatty acid CnH(2n-2u)O(2+h).
 * Entries may be negative for nonsensical structures; the assembler rejects them.
 */
export function getStructureFormula(structure: Structure): AtomCount {
  const { carbons, unsaturation, hydroxyls } = structure;
  if (structure.kind === 'lcb') {
    return { C: carbons, H: 2 * carbons + 3 - 2 * unsaturation, N: 1, O: hydroxyls };
  }
  return { C: carbons, H: 2 * carbons - 2 * unsaturation, O: 2 + hydroxyls };
}

/**
 * Parse shorthand such as "18:1;2" or "16:0". A long-chain base without a
 * hydroxyl suffix takes `defaultHydroxyls`.
 */
export function parseStructureName(text: string, kind: StructureKind, defaultHydroxyls = 2): Structure {
  const match = STRUCTURE_NAME_RE.exec(text.trim());
  if (!match) {
    throw new ConfigurationError(`Unrecognized ${kind === 'lcb' ? 'long-chain base' : 'fatty acid'} "${text}"`);
  }
  const carbons = Number.parseInt(match[1] ?? '0', 10);
  const unsaturation = Number.parseInt(match[2] ?? '0', 10);
  const hydroxyls =
    match[3] !== undefined ? Number.parseInt(match[3], 10) : kind === 'lcb' ? defaultHydroxyls : 0;
  return createStructure(kind, carbons, unsaturation, hydroxyls);
}
