import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { sortBy } from 'es-toolkit';
import { z } from 'zod';
import type { AtomDelta, FragmentRule, LipidClassDef, RulePolarity } from 'types';
import { MAX_CHARGE, MIN_CHARGE, MONOISOTOPIC_MASSES } from 'src/constants';
import { ConfigurationError, toConfigurationError } from 'src/errors';
import { addCounts, parseFormula, parseFormulaDelta, scaleCount } from 'src/utils/atom-count';

const DEFAULT_DATA_FILE = fileURLToPath(new URL('../../data/lipid-classes.json', import.meta.url));

const WATER = parseFormula('H2O');

const chargeSchema = z.number().int().min(MIN_CHARGE).max(MAX_CHARGE);
const polaritySchema = z.enum(['positive', 'negative', 'both']);

const motifRefSchema = z.string().regex(/^@[\w-]+$/, 'Motif references look like "@name"');

const lossEntrySchema = z
  .object({
    name: z.string().min(1),
    loss: z.string().min(1),
    polarity: polaritySchema.optional(),
    charges: z.array(chargeSchema).min(1).optional(),
  })
  .strict();

const headgroupEntrySchema = z
  .object({
    name: z.string().min(1),
    basis: z.literal('headgroup'),
    formula: z.string().min(1),
    polarity: polaritySchema.optional(),
    charges: z.array(chargeSchema).min(1).optional(),
  })
  .strict();

const deltaEntrySchema = z
  .object({
    name: z.string().min(1),
    basis: z.enum(['precursor', 'lcb', 'fa']),
    delta: z.string(),
    polarity: polaritySchema.optional(),
    charges: z.array(chargeSchema).min(1).optional(),
    retainsPrecursorIon: z.boolean().optional(),
  })
  .strict()
  .refine((entry) => !(entry.retainsPrecursorIon && entry.charges), {
    message: 'A rule that keeps the precursor ion takes its charge and cannot list charges',
    path: ['charges'],
  });

const ruleEntrySchema = z.union([motifRefSchema, lossEntrySchema, headgroupEntrySchema, deltaEntrySchema]);

type RuleEntry = z.infer<typeof ruleEntrySchema>;

const lipidClassSchema = z
  .object({
    id: z.string().min(1),
    family: z.enum(['ceramide', 'sphingomyelin', 'glycosphingolipid']),
    headgroup: z.string(),
    sialicAcids: z.number().int().nonnegative().default(0),
    acidicGroups: z.number().int().nonnegative().default(0),
    charge: z
      .object({ min: chargeSchema, max: chargeSchema })
      .refine((range) => range.min <= range.max, 'charge.min must not exceed charge.max'),
    maxNegativeCharge: chargeSchema.optional(),
    recommendedCharges: z.array(chargeSchema).min(1),
    lcbBaseHydroxyls: z.number().int().nonnegative().default(2),
    defaultIsotopeLabel: z.string().min(1).default('M2DN15'),
    description: z.string().default(''),
    massRange: z.string().default(''),
    fragments: z.array(ruleEntrySchema),
  })
  .strict();

export const lipidClassCatalogSchema = z
  .object({
    motifs: z.record(z.array(ruleEntrySchema)).default({}),
    classes: z.array(lipidClassSchema).min(1),
  })
  .strict();

export type LipidClassCatalog = z.input<typeof lipidClassCatalogSchema>;

type ParsedCatalog = z.infer<typeof lipidClassCatalogSchema>;

export interface LipidClassRegistry {
  /** Throws ConfigurationError for an unknown id. Exact match first, then case-insensitive. */
  get(id: string): LipidClassDef;
  has(id: string): boolean;
  /** Every class, sorted by id. */
  list(): readonly LipidClassDef[];
}

function freezeRule(rule: FragmentRule): FragmentRule {
  Object.freeze(rule.delta);
  Object.freeze(rule.charges);
  return Object.freeze(rule);
}

function makeRule(
  name: string,
  basis: FragmentRule['basis'],
  delta: AtomDelta,
  polarity: RulePolarity,
  charges: readonly number[] = [1],
  retainsPrecursorIon = false,
): FragmentRule {
  return freezeRule({ name, basis, delta, polarity, charges: [...charges], retainsPrecursorIon });
}

/**
 * Parse a catalog formula or delta. Every element must have a mass, so that
 * nothing fails later in the middle of a run.
 */
function parseDelta(text: string, path: readonly (string | number)[], parse: (text: string) => AtomDelta): AtomDelta {
  let parsed: AtomDelta;
  try {
    parsed = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(message, path);
  }
  const unknown = Object.keys(parsed).find((element) => MONOISOTOPIC_MASSES[element] === undefined);
  if (unknown !== undefined) {
    throw new ConfigurationError(`No monoisotopic mass for element ${unknown}`, path);
  }
  return parsed;
}

/**
 * A glycan loss becomes an intact-minus-loss rule for positive precursors and
 * a Y-ion rule (loss minus one water) for negative precursors.
 */
function expandLoss(entry: z.infer<typeof lossEntrySchema>, path: readonly (string | number)[]): FragmentRule[] {
  const loss = parseDelta(entry.loss, [...path, 'loss'], parseFormula);
  const removed = scaleCount(loss, -1);
  const polarity = entry.polarity ?? 'both';
  const rules: FragmentRule[] = [];
  if (polarity !== 'negative') {
    rules.push(makeRule(entry.name, 'precursor', removed, 'positive', entry.charges));
  }
  if (polarity !== 'positive') {
    rules.push(makeRule(entry.name, 'precursor', addCounts(removed, WATER), 'negative', entry.charges));
  }
  return rules;
}

function expandEntries(
  entries: readonly RuleEntry[],
  motifs: ParsedCatalog['motifs'],
  path: readonly (string | number)[],
  trail: readonly string[],
): FragmentRule[] {
  const rules: FragmentRule[] = [];

  entries.forEach((entry, index) => {
    const entryPath = [...path, index];

    if (typeof entry === 'string') {
      const motifName = entry.slice(1);
      const motif = motifs[motifName];
      if (!motif) {
        throw new ConfigurationError(`Unknown fragment motif "${motifName}"`, entryPath);
      }
      if (trail.includes(motifName)) {
        throw new ConfigurationError(`Fragment motif cycle: ${[...trail, motifName].join(' -> ')}`, entryPath);
      }
      rules.push(...expandEntries(motif, motifs, ['motifs', motifName], [...trail, motifName]));
      return;
    }

    if ('loss' in entry) {
      rules.push(...expandLoss(entry, entryPath));
      return;
    }

    if (entry.basis === 'headgroup') {
      const formula = parseDelta(entry.formula, [...entryPath, 'formula'], parseFormula);
      rules.push(makeRule(entry.name, 'headgroup', formula, entry.polarity ?? 'both', entry.charges));
      return;
    }

    const delta = parseDelta(entry.delta, [...entryPath, 'delta'], parseFormulaDelta);
    rules.push(
      makeRule(
        entry.name,
        entry.basis,
        delta,
        entry.polarity ?? 'both',
        entry.charges,
        entry.retainsPrecursorIon ?? false,
      ),
    );
  });

  return rules;
}

function buildClassDef(
  raw: ParsedCatalog['classes'][number],
  motifs: ParsedCatalog['motifs'],
  index: number,
): LipidClassDef {
  const path = ['classes', index];
  const headgroup = parseDelta(raw.headgroup, [...path, 'headgroup'], parseFormula);
  const fragments = expandEntries(raw.fragments, motifs, [...path, 'fragments'], []);

  const outOfRange = raw.recommendedCharges.find((z) => z < raw.charge.min || z > raw.charge.max);
  if (outOfRange !== undefined) {
    throw new ConfigurationError(
      `Recommended charge ${outOfRange} lies outside ${raw.charge.min}..${raw.charge.max}`,
      [...path, 'recommendedCharges'],
    );
  }

  return Object.freeze({
    id: raw.id,
    family: raw.family,
    headgroup: Object.freeze(headgroup),
    sialicAcids: raw.sialicAcids,
    acidicGroups: raw.acidicGroups,
    charge: Object.freeze({ ...raw.charge }),
    maxNegativeCharge: raw.maxNegativeCharge ?? raw.sialicAcids + raw.acidicGroups + 1,
    recommendedCharges: Object.freeze([...raw.recommendedCharges]),
    lcbBaseHydroxyls: raw.lcbBaseHydroxyls,
    defaultIsotopeLabel: raw.defaultIsotopeLabel,
    description: raw.description,
    massRange: raw.massRange,
    fragments: Object.freeze(fragments),
  });
}

/**
 * Validate a catalog and expand its motif references and loss entries into
 * plain fragment rules.
 */
export function createLipidClassRegistry(data: unknown): LipidClassRegistry {
  const parsed = lipidClassCatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }

  const byId = new Map<string, LipidClassDef>();
  parsed.data.classes.forEach((raw, index) => {
    if (byId.has(raw.id)) {
      throw new ConfigurationError(`Duplicate lipid class "${raw.id}"`, ['classes', index, 'id']);
    }
    byId.set(raw.id, buildClassDef(raw, parsed.data.motifs, index));
  });

  const sorted = Object.freeze(sortBy([...byId.values()], [(def) => def.id]));

  function find(id: string): LipidClassDef | undefined {
    const exact = byId.get(id);
    if (exact) return exact;
    const lower = id.toLowerCase();
    return sorted.find((def) => def.id.toLowerCase() === lower);
  }

  return {
    get(id: string): LipidClassDef {
      const def = find(id.trim());
      if (!def) {
        throw new ConfigurationError(`Unknown lipid class "${id}"`);
      }
      return def;
    },
    has(id: string): boolean {
      return find(id.trim()) !== undefined;
    },
    list(): readonly LipidClassDef[] {
      return sorted;
    },
  };
}

export function loadLipidClassRegistry(filePath: string = DEFAULT_DATA_FILE): LipidClassRegistry {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return createLipidClassRegistry(raw);
}

let defaultRegistry: LipidClassRegistry | undefined;

/**
 * Built-in catalog, read from data/lipid-classes.json on first use.
 */
export function getDefaultRegistry(): LipidClassRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadLipidClassRegistry();
    if (process.env.VERBOSE) {
      console.debug(`[registry] loaded ${defaultRegistry.list().length} lipid classes`);
    }
  }
  return defaultRegistry;
}

export function getLipidClass(id: string): LipidClassDef {
  return getDefaultRegistry().get(id);
}

export function listLipidClasses(): readonly LipidClassDef[] {
  return getDefaultRegistry().list();
}
