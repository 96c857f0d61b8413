import { z } from 'zod';
import type { AdductDef } from 'types';
import { MAX_CHARGE, MIN_CHARGE } from 'src/constants';
import { ConfigurationError, toConfigurationError } from 'src/errors';
import { findAdduct } from 'src/ionization/adducts';
import { createIsotopeLabel, DEFAULT_LABEL_KEYWORDS } from 'src/labeling/isotope-labels';
import { getDefaultRegistry, type LipidClassRegistry } from 'src/registry/lipid-class-registry';
import type { TransitionRequest } from 'src/transitions/transition-generator';

const countSchema = z.number().int().nonnegative();

const carbonRangeSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max', path: ['min'] });

const lcbSchema = z.object({
  carbons: carbonRangeSchema,
  unsaturations: z.array(countSchema).min(1),
  hydroxylations: z.array(countSchema).min(1).default([0]),
  baseHydroxyls: countSchema.optional(),
});

const fattyAcidSchema = z.object({
  carbons: carbonRangeSchema,
  maxUnsaturation: countSchema,
  parity: z.enum(['even', 'odd', 'both']).default('both'),
});

const isotopeLabelingSchema = z.object({
  enabled: z.boolean().default(false),
  token: z.string().min(1).optional(), // defaults to the lipid class's label
  keywords: z.union([z.string(), z.array(z.string())]).default(DEFAULT_LABEL_KEYWORDS),
});

export const generationConfigSchema = z
  .object({
    lipidClass: z.string().min(1).default('Cer'),
    lcb: lcbSchema.default({ carbons: { min: 18, max: 18 }, unsaturations: [0, 1, 2], hydroxylations: [0] }),
    fattyAcid: fattyAcidSchema.default({ carbons: { min: 16, max: 26 }, maxUnsaturation: 1, parity: 'both' }),
    charges: z.array(z.number().int().min(MIN_CHARGE).max(MAX_CHARGE)).min(1).default([1]),
    autoCharges: z.boolean().default(false),
    adducts: z.array(z.string().min(1)).min(1).default(['[M+H]+', '[M-H]-']),
    productAdducts: z.array(z.string().min(1)).min(1).optional(),
    isotopeLabeling: isotopeLabelingSchema.default({}),
  })
  .strict();

/** Plain JSON shape accepted by resolveGenerationConfig. */
export type GenerationConfigInput = z.input<typeof generationConfigSchema>;
export type GenerationConfig = z.infer<typeof generationConfigSchema>;

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = Object.freeze(generationConfigSchema.parse({}));

function resolveAdducts(names: readonly string[], field: string): AdductDef[] {
  return names.map((name, index) => {
    const adduct = findAdduct(name);
    if (!adduct) {
      throw new ConfigurationError(`Unknown adduct "${name}"`, [field, index]);
    }
    return adduct;
  });
}

/**
 * Validate a configuration object and turn it into an engine request:
 * class id to definition, adduct names to catalog entries, label token to
 * substitutions. Missing fields take the defaults of DEFAULT_GENERATION_CONFIG.
 */
export function resolveGenerationConfig(
  input: unknown,
  registry: LipidClassRegistry = getDefaultRegistry(),
): TransitionRequest {
  const parsed = generationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error);
  }
  const config = parsed.data;

  if (!registry.has(config.lipidClass)) {
    throw new ConfigurationError(`Unknown lipid class "${config.lipidClass}"`, ['lipidClass']);
  }
  const lipidClass = registry.get(config.lipidClass);

  const request: TransitionRequest = {
    lipidClass,
    lcb: config.lcb,
    fattyAcid: config.fattyAcid,
    charges: config.autoCharges ? lipidClass.recommendedCharges : config.charges,
    adducts: resolveAdducts(config.adducts, 'adducts'),
  };

  if (config.productAdducts) {
    request.productAdducts = resolveAdducts(config.productAdducts, 'productAdducts');
  }

  const labeling = config.isotopeLabeling;
  if (labeling.enabled) {
    try {
      request.isotopeLabel = createIsotopeLabel(labeling.token ?? lipidClass.defaultIsotopeLabel, labeling.keywords);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(error.reason, ['isotopeLabeling', ...error.path]);
      }
      throw error;
    }
  }

  if (process.env.VERBOSE) {
    console.debug(
      `[config] ${lipidClass.id}: charges ${request.charges.join(',')}, adducts ${config.adducts.join(',')}` +
        (request.isotopeLabel ? `, label ${request.isotopeLabel.token}` : ''),
    );
  }
  return request;
}
