import { describe, it, expect } from 'vitest';
import { ConfigurationError } from 'src/errors';
import {
  createLipidClassRegistry,
  getLipidClass,
  listLipidClasses,
} from 'src/registry/lipid-class-registry';

function testClass(overrides: Record<string, unknown> = {}) {
  return {
    id: 'TestCer',
    family: 'ceramide',
    headgroup: '',
    charge: { min: 1, max: 1 },
    recommendedCharges: [1],
    fragments: [],
    ...overrides,
  };
}

describe('Lipid class registry', () => {
  describe('built-in catalog', () => {
    it('should list every class sorted by id', () => {
      const ids = listLipidClasses().map((def) => def.id);
      expect(ids).toHaveLength(31);
      expect(ids).toEqual([...ids].sort());
      expect(ids.slice(0, 4)).toEqual(['Cer', 'GA1', 'GA2', 'GD1a']);
      expect(ids).toContain('nLc10');
    });

    it('should derive the negative charge bound from ionizable sites', () => {
      const gd1a = getLipidClass('GD1a');
      expect(gd1a.sialicAcids).toBe(2);
      expect(gd1a.maxNegativeCharge).toBe(3);
      expect(gd1a.charge).toEqual({ min: 1, max: 3 });
      expect(getLipidClass('SM4').maxNegativeCharge).toBe(2);
      expect(getLipidClass('GP1').maxNegativeCharge).toBe(6);
    });

    it('should look ids up exactly, then ignoring case', () => {
      expect(getLipidClass('gd1a').id).toBe('GD1a');
      expect(getLipidClass('sm').id).toBe('SM');
      expect(() => getLipidClass('GX9')).toThrow('Unknown lipid class "GX9"');
      expect(() => getLipidClass('GX9')).toThrow(ConfigurationError);
    });

    it('should carry the 1-deoxy baseline and label', () => {
      const doxCer = getLipidClass('doxCer');
      expect(doxCer.lcbBaseHydroxyls).toBe(1);
      expect(doxCer.defaultIsotopeLabel).toBe('M3D');
      expect(getLipidClass('Cer').defaultIsotopeLabel).toBe('M2DN15');
    });

    it('should expand motifs in declaration order', () => {
      expect(getLipidClass('Cer').fragments.map((rule) => rule.name)).toEqual([
        'precursor',
        'precursor-(H2O,18)',
        'LCB {lcb}(-HO)',
        'LCB {lcb}(-H3O2)',
        'LCB {lcb}(-CH3O2)',
      ]);
    });

    it('should expand a glycan loss into a positive and a Y-ion rule', () => {
      const rules = getLipidClass('GM1').fragments.filter((rule) => rule.name === 'HG(-Neu5Ac,309)');
      expect(rules.map((rule) => [rule.basis, rule.polarity, rule.delta])).toEqual([
        ['precursor', 'positive', { C: -11, H: -19, N: -1, O: -9 }],
        ['precursor', 'negative', { C: -11, H: -17, N: -1, O: -8 }],
      ]);
    });

    it('should keep doubly charged product rules negative-only', () => {
      const rule = getLipidClass('GT1b').fragments.find((entry) => entry.name === 'HG(-Neu5Ac,309) [Z=2]');
      expect(rule?.polarity).toBe('negative');
      expect(rule?.charges).toEqual([2]);
    });

    it('should freeze definitions', () => {
      const gm3 = getLipidClass('GM3');
      expect(Object.isFrozen(gm3)).toBe(true);
      expect(Object.isFrozen(gm3.fragments)).toBe(true);
      expect(Object.isFrozen(gm3.headgroup)).toBe(true);
    });
  });

  describe('createLipidClassRegistry', () => {
    it('should apply defaults to a minimal class', () => {
      const registry = createLipidClassRegistry({ classes: [testClass()] });
      const def = registry.get('TestCer');
      expect(def.sialicAcids).toBe(0);
      expect(def.maxNegativeCharge).toBe(1);
      expect(def.lcbBaseHydroxyls).toBe(2);
      expect(def.headgroup).toEqual({});
      expect(registry.has('testcer')).toBe(true);
      expect(registry.has('Other')).toBe(false);
    });

    it('should honor an explicit negative charge bound', () => {
      const registry = createLipidClassRegistry({
        classes: [testClass({ charge: { min: 1, max: 4 }, maxNegativeCharge: 2 })],
      });
      expect(registry.get('TestCer').maxNegativeCharge).toBe(2);
    });

    it('should default rule polarity and charges', () => {
      const registry = createLipidClassRegistry({
        classes: [testClass({ fragments: [{ name: 'FA {fa}', basis: 'fa', delta: '' }] })],
      });
      const [rule] = registry.get('TestCer').fragments;
      expect(rule).toEqual({
        name: 'FA {fa}',
        basis: 'fa',
        delta: {},
        polarity: 'both',
        charges: [1],
        retainsPrecursorIon: false,
      });
    });

    it('should report schema violations with their path', () => {
      expect(() => createLipidClassRegistry({ classes: [testClass({ charge: { min: 1, max: 6 } })] })).toThrow(
        /^classes\.0\.charge\.max: /,
      );
    });

    it('should reject malformed formulas', () => {
      expect(() => createLipidClassRegistry({ classes: [testClass({ headgroup: 'C6h10' })] })).toThrow(
        /^classes\.0\.headgroup: Malformed formula/,
      );
    });

    it('should reject elements without a mass before any run', () => {
      expect(() => createLipidClassRegistry({ classes: [testClass({ headgroup: 'C6H10O5Cl' })] })).toThrow(
        'classes.0.headgroup: No monoisotopic mass for element Cl',
      );
      expect(() =>
        createLipidClassRegistry({ classes: [testClass({ fragments: [{ name: 'LCB', basis: 'lcb', delta: '-Xe' }] })] }),
      ).toThrow('classes.0.fragments.0.delta: No monoisotopic mass for element Xe');
      expect(() =>
        createLipidClassRegistry({ classes: [testClass({ fragments: [{ name: 'HG(-Br)', loss: 'Br' }] })] }),
      ).toThrow('classes.0.fragments.0.loss: No monoisotopic mass for element Br');
      expect(() =>
        createLipidClassRegistry({
          motifs: { oxonium: [{ name: 'HG(I)', basis: 'headgroup', formula: 'C6I' }] },
          classes: [testClass({ fragments: ['@oxonium'] })],
        }),
      ).toThrow('motifs.oxonium.0.formula: No monoisotopic mass for element I');
    });

    it('should not let a precursor-retaining rule list product charges', () => {
      const fragments = [{ name: 'precursor', basis: 'precursor', delta: '', retainsPrecursorIon: true, charges: [2] }];
      expect(() =>
        createLipidClassRegistry({ classes: [testClass({ charge: { min: 1, max: 2 }, fragments })] }),
      ).toThrow(
        'classes.0.fragments.0.charges: A rule that keeps the precursor ion takes its charge and cannot list charges',
      );
    });

    it('should reject unknown and cyclic motifs', () => {
      expect(() => createLipidClassRegistry({ classes: [testClass({ fragments: ['@missing'] })] })).toThrow(
        'Unknown fragment motif "missing"',
      );
      expect(() =>
        createLipidClassRegistry({
          motifs: { a: ['@b'], b: ['@a'] },
          classes: [testClass({ fragments: ['@a'] })],
        }),
      ).toThrow('Fragment motif cycle: a -> b -> a');
    });

    it('should reject duplicate ids and stray recommended charges', () => {
      expect(() => createLipidClassRegistry({ classes: [testClass(), testClass()] })).toThrow(
        'classes.1.id: Duplicate lipid class "TestCer"',
      );
      expect(() => createLipidClassRegistry({ classes: [testClass({ recommendedCharges: [2] })] })).toThrow(
        'Recommended charge 2 lies outside 1..1',
      );
    });
  });
});
