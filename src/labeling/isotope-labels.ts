import type { IsotopeLabelSpec, IsotopeSubstitution } from 'types';
import { ISOTOPE_MASSES } from 'src/constants';
import { ConfigurationError } from 'src/errors';

export const DEFAULT_LABEL_KEYWORDS = 'LCB,precursor,HG(-Hex';

interface IsotopeSymbol {
  symbol: string;
  element: string;
  massNumber: number;
}

const ISOTOPE_SYMBOLS: readonly IsotopeSymbol[] = [
  { symbol: 'C13', element: 'C', massNumber: 13 },
  { symbol: 'N15', element: 'N', massNumber: 15 },
  { symbol: 'O18', element: 'O', massNumber: 18 },
  { symbol: 'D', element: 'H', massNumber: 2 },
];

const ADDUCT_INSERT_RE = /^\[(\d*)M/;

function isotopeMass(element: string, massNumber: number): number {
  const mass = ISOTOPE_MASSES[element]?.[massNumber];
  if (mass === undefined) {
    throw new ConfigurationError(`No mass for isotope ${massNumber}${element}`);
  }
  return mass;
}

/**
 * Canonical label token: upper case with a leading "M" ("m2dn15" -> "M2DN15").
 */
export function normalizeLabelToken(token: string): string {
  const upper = token.trim().toUpperCase();
  return upper.startsWith('M') ? upper : `M${upper}`;
}

/**
 * Parse a label token into substitutions. Each isotope symbol is preceded by
 * an optional count: "M2DN15" is two ²H and one ¹⁵N, "M4D2N15" four ²H and
 * two ¹⁵N. Symbols are D, C13, N15 and O18.
 */
export function parseIsotopeLabel(token: string): IsotopeSubstitution[] {
  const text = normalizeLabelToken(token).slice(1);
  if (text.length === 0) {
    throw new ConfigurationError(`Isotope label "${token}" names no isotopes`);
  }

  const counts = new Map<IsotopeSymbol, number>();
  let position = 0;

  while (position < text.length) {
    const digits = /^\d*/.exec(text.slice(position))?.[0] ?? '';
    position += digits.length;
    const count = digits ? Number.parseInt(digits, 10) : 1;

    const rest = text.slice(position);
    const isotope = ISOTOPE_SYMBOLS.find((entry) => rest.startsWith(entry.symbol));
    if (!isotope) {
      const found = rest.length > 0 ? `"${rest.slice(0, 3)}"` : 'end of label';
      throw new ConfigurationError(
        `Unrecognized isotope ${found} at position ${position} in "${token}" (valid: D, C13, N15, O18)`,
      );
    }
    if (count === 0) {
      throw new ConfigurationError(`Isotope count must be positive in "${token}"`);
    }
    counts.set(isotope, (counts.get(isotope) ?? 0) + count);
    position += isotope.symbol.length;
  }

  return [...counts].map(([isotope, count]) => ({
    element: isotope.element,
    massNumber: isotope.massNumber,
    mass: isotopeMass(isotope.element, isotope.massNumber),
    count,
  }));
}

/**
 * Split a comma-separated keyword list. Blank entries are dropped.
 */
export function parseLabelKeywords(keywords: string | readonly string[]): string[] {
  const parts = typeof keywords === 'string' ? keywords.split(',') : keywords;
  return parts.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
}

export function createIsotopeLabel(
  token: string,
  keywords: string | readonly string[] = DEFAULT_LABEL_KEYWORDS,
): IsotopeLabelSpec {
  const parsedKeywords = parseLabelKeywords(keywords);
  if (parsedKeywords.length === 0) {
    throw new ConfigurationError('Isotope labeling needs at least one product keyword', ['keywords']);
  }
  const substitutions = parseIsotopeLabel(token).map((sub) => Object.freeze(sub));
  return Object.freeze({
    token: normalizeLabelToken(token),
    substitutions: Object.freeze(substitutions),
    keywords: Object.freeze(parsedKeywords),
  });
}

/**
 * A product is labeled when its name contains any keyword, ignoring case.
 */
export function isLabelEligible(productName: string, keywords: readonly string[]): boolean {
  const name = productName.toLowerCase();
  return keywords.some((keyword) => name.includes(keyword.toLowerCase()));
}

/**
 * "[M+H]1+" with "M2DN15" -> "[M2DN15+H]1+". A multimer prefix is kept
 * ("[2M+H]1+" -> "[2M2DN15+H]1+").
 */
export function formatHeavyAdduct(adductText: string, token: string): string {
  const label = normalizeLabelToken(token);
  return adductText.replace(ADDUCT_INSERT_RE, (_match, prefix: string) => `[${prefix}${label}`);
}
