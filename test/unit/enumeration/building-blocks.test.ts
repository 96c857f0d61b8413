import { describe, it, expect } from 'vitest';
import {
  createStructure,
  enumerateFattyAcids,
  enumerateLcbs,
  getStructureFormula,
  parseStructureName,
} from 'src/enumeration/building-blocks';
import { ConfigurationError } from 'src/errors';

const names = (structures: Iterable<{ name: string }>) => Array.from(structures, (s) => s.name);

describe('Building block enumeration', () => {
  describe('enumerateLcbs', () => {
    it('should order by carbons, then unsaturation, then hydroxylation', () => {
      const lcbs = enumerateLcbs({ carbons: { min: 17, max: 18 }, unsaturations: [1, 0, 1], hydroxylations: [1, 0] });
      expect(names(lcbs)).toEqual(['17:0;2', '17:0;3', '17:1;2', '17:1;3', '18:0;2', '18:0;3', '18:1;2', '18:1;3']);
    });

    it('should count hydroxylation beyond the baseline', () => {
      const spec = { carbons: { min: 18, max: 18 }, unsaturations: [1], hydroxylations: [0] };
      expect(names(enumerateLcbs(spec))).toEqual(['18:1;2']);
      expect(names(enumerateLcbs(spec, 1))).toEqual(['18:1;1']);
      expect(names(enumerateLcbs({ ...spec, baseHydroxyls: 3 }, 1))).toEqual(['18:1;3']);
    });

    it('should restart on every iteration', () => {
      const lcbs = enumerateLcbs({ carbons: { min: 16, max: 17 }, unsaturations: [0], hydroxylations: [0] });
      expect(names(lcbs)).toEqual(['16:0;2', '17:0;2']);
      expect(names(lcbs)).toEqual(['16:0;2', '17:0;2']);
    });

    it('should yield nothing for an inverted range', () => {
      expect(names(enumerateLcbs({ carbons: { min: 19, max: 18 }, unsaturations: [0], hydroxylations: [0] }))).toEqual(
        [],
      );
    });
  });

  describe('enumerateFattyAcids', () => {
    it('should apply the parity filter', () => {
      const base = { carbons: { min: 16, max: 19 }, maxUnsaturation: 1 };
      expect(names(enumerateFattyAcids({ ...base, parity: 'even' }))).toEqual(['16:0', '16:1', '18:0', '18:1']);
      expect(names(enumerateFattyAcids({ ...base, parity: 'odd' }))).toEqual(['17:0', '17:1', '19:0', '19:1']);
      expect(names(enumerateFattyAcids({ ...base, parity: 'both' }))).toHaveLength(8);
    });

    it('should yield nothing when no carbon count survives', () => {
      expect(names(enumerateFattyAcids({ carbons: { min: 17, max: 17 }, maxUnsaturation: 0, parity: 'even' }))).toEqual(
        [],
      );
    });
  });

  describe('getStructureFormula', () => {
    it('should give the free long-chain base and free fatty acid', () => {
      expect(getStructureFormula(createStructure('lcb', 18, 1, 2))).toEqual({ C: 18, H: 37, N: 1, O: 2 });
      expect(getStructureFormula(createStructure('fa', 16, 0, 0))).toEqual({ C: 16, H: 32, O: 2 });
      expect(getStructureFormula(createStructure('fa', 24, 1, 1))).toEqual({ C: 24, H: 46, O: 3 });
    });
  });

  describe('parseStructureName', () => {
    it('should parse shorthand names', () => {
      expect(parseStructureName('18:1;2', 'lcb')).toEqual({
        kind: 'lcb',
        carbons: 18,
        unsaturation: 1,
        hydroxyls: 2,
        name: '18:1;2',
      });
      expect(parseStructureName('18:1', 'lcb', 1).name).toBe('18:1;1');
      expect(parseStructureName(' 16:0 ', 'fa').name).toBe('16:0');
    });

    it('should reject malformed names', () => {
      expect(() => parseStructureName('18-1', 'lcb')).toThrow(ConfigurationError);
      expect(() => parseStructureName('C16', 'fa')).toThrow('Unrecognized fatty acid "C16"');
    });
  });
});
