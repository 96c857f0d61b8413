import type { AtomCount, AtomDelta } from 'types';
import { FormulaError } from 'src/errors';

const ELEMENT_RE = /([A-Z][a-z]?)(\d*)/g;
const DELTA_TERM_RE = /([+-]?)([A-Z][A-Za-z0-9]*)/g;

/**
 * Parse a plain molecular formula such as "C11H17NO8".
 * Repeated elements accumulate ("CH3CH2" -> C2H5).
 */
export function parseFormula(text: string): AtomCount {
  const trimmed = text.trim();
  const counts: Record<string, number> = {};
  let consumed = 0;

  for (const match of trimmed.matchAll(ELEMENT_RE)) {
    if (match.index !== consumed) break;
    const symbol = match[1] ?? '';
    const digits = match[2] ?? '';
    counts[symbol] = (counts[symbol] ?? 0) + (digits ? Number.parseInt(digits, 10) : 1);
    consumed += match[0].length;
  }

  if (consumed !== trimmed.length) {
    throw new FormulaError(`Malformed formula "${text}" at position ${consumed}`);
  }
  return normalizeCount(counts);
}

/**
 * Parse a signed formula delta: "-C11H19NO9+H2O", "+HN-O".
 * A leading term without a sign is added. The empty string is the zero delta.
 */
export function parseFormulaDelta(text: string): AtomDelta {
  const trimmed = text.replace(/\s+/g, '');
  const delta: Record<string, number> = {};
  let consumed = 0;

  for (const match of trimmed.matchAll(DELTA_TERM_RE)) {
    if (match.index !== consumed) break;
    const sign = match[1] === '-' ? -1 : 1;
    const term = parseFormula(match[2] ?? '');
    for (const [element, n] of Object.entries(term)) {
      delta[element] = (delta[element] ?? 0) + sign * n;
    }
    consumed += match[0].length;
  }

  if (consumed !== trimmed.length) {
    throw new FormulaError(`Malformed formula delta "${text}" at position ${consumed}`);
  }
  return normalizeCount(delta);
}

/**
 * Drop zero entries so that absence and zero compare equal.
 */
export function normalizeCount(counts: Readonly<Record<string, number>>): AtomCount {
  const out: Record<string, number> = {};
  for (const [element, n] of Object.entries(counts)) {
    if (n !== 0) out[element] = n;
  }
  return out;
}

export function addCounts(...parts: readonly AtomCount[]): AtomCount {
  const sum: Record<string, number> = {};
  for (const part of parts) {
    for (const [element, n] of Object.entries(part)) {
      sum[element] = (sum[element] ?? 0) + n;
    }
  }
  return normalizeCount(sum);
}

/**
 * Apply a signed delta. The result may hold negative entries; callers decide
 * whether that is an error or a skip.
 */
export function applyDelta(base: AtomCount, delta: AtomDelta): Readonly<Record<string, number>> {
  return addCounts(base, delta);
}

export function scaleCount(counts: AtomCount, factor: number): AtomCount {
  const out: Record<string, number> = {};
  for (const [element, n] of Object.entries(counts)) {
    out[element] = n * factor;
  }
  return normalizeCount(out);
}

/**
 * First element with a negative count, or undefined.
 */
export function findNegativeElement(counts: Readonly<Record<string, number>>): string | undefined {
  return Object.keys(counts).find((element) => (counts[element] ?? 0) < 0);
}

/**
 * Hill-order formula string: C and H first when carbon is present, the rest
 * alphabetical. Without carbon every element is alphabetical.
 */
export function formatFormula(counts: AtomCount): string {
  const remaining: Record<string, number> = { ...normalizeCount(counts) };
  const parts: string[] = [];

  function formatPart(symbol: string, count: number) {
    return count === 1 ? symbol : `${symbol}${count}`;
  }

  if (remaining['C'] !== undefined) {
    parts.push(formatPart('C', remaining['C']));
    delete remaining['C'];
    if (remaining['H'] !== undefined) {
      parts.push(formatPart('H', remaining['H']));
      delete remaining['H'];
    }
  }
  for (const element of Object.keys(remaining).sort()) {
    parts.push(formatPart(element, remaining[element] ?? 0));
  }
  return parts.join('');
}
