import type { NormalizedAugmentSet } from '../types/index.js';

// Informational lines the game appends to some augments (e.g. "System: Augment Points: 350").
const SYSTEM_MARKER = 'System:';

function isQuote(char: string | undefined): boolean {
  return char === '"' || char === "'";
}

function stripOuterBraces(value: string): string {
  if (value.length >= 2 && value.startsWith('{') && value.endsWith('}')) {
    return value.slice(1, -1);
  }
  return value;
}

function stripOuterQuotes(value: string): string {
  if (value.length >= 2 && isQuote(value[0]) && value[value.length - 1] === value[0]) {
    return value.slice(1, -1);
  }
  return value;
}

// Commas inside a quoted run belong to the augment text ("Pet: Acc.+5, Mag. Acc.+5").
function splitUnquotedCommas(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;

  for (const char of value) {
    if (quote === null && isQuote(char)) {
      quote = char;
    } else if (quote !== null && char === quote) {
      quote = null;
    } else if (quote === null && char === ',') {
      parts.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  parts.push(current);
  return parts;
}

function splitSegments(value: string): string[] {
  return value.includes(';') ? value.split(';') : splitUnquotedCommas(value);
}

function cleanSegment(segment: string): string | undefined {
  const unquoted = stripOuterQuotes(segment.trim()).replaceAll('""', '"').trim();
  if (!unquoted || unquoted.startsWith(SYSTEM_MARKER)) return undefined;
  return unquoted.toLowerCase();
}

/**
 * Canonicalizes an augment list written either as inventory CSV text
 * (`Accuracy+5; Store TP+3`) or as a GearSwap table body
 * (`{'Accuracy+5','Store TP+3'}`) into an order-independent set.
 */
export function normalizeAugments(raw: string): NormalizedAugmentSet {
  const normalized = new Set<string>();
  const trimmed = raw.trim();
  if (!trimmed) return normalized;

  for (const segment of splitSegments(stripOuterBraces(trimmed))) {
    const token = cleanSegment(segment);
    if (token) normalized.add(token);
  }
  return normalized;
}

export function serializeAugments(augments: NormalizedAugmentSet): string {
  const quoted = [...augments].sort().map((token) => `"${token.replaceAll('"', '""')}"`);
  return `{${quoted.join(',')}}`;
}

export function isAugmentSubset(required: NormalizedAugmentSet, available: NormalizedAugmentSet): boolean {
  if (required.size > available.size) return false;
  for (const token of required) {
    if (!available.has(token)) return false;
  }
  return true;
}
