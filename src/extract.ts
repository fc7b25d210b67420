import { resolve } from 'node:path';
import fg from 'fast-glob';
import { SourceUnreadableError } from './errors.js';
import { createReference, ReferenceSet } from './lib/references.js';
import { tokenize, type Token } from './lib/scanner.js';
import { isDirectory, readTextLenient } from './utils/fs.js';
import { log } from './utils/log.js';
import type { Reference, SourceFailure, SourceSummary } from './types/index.js';

export type SourceExtraction =
  | { status: 'ok'; source: string; references: ReferenceSet }
  | { status: 'unreadable'; source: string; error: SourceUnreadableError };

export interface BatchExtraction {
  references: ReferenceSet;
  sources: SourceSummary[];
  failures: SourceFailure[];
}

const NON_ITEM_VALUES = new Set([
  'none',
  'empty',
  'true',
  'false',
  'nil',
  'normal',
  'acc',
  'dt',
  'pdt',
  'mdt',
  'idle',
  'engaged',
  'defense',
  'offense',
  'physical',
  'magical',
  'hybrid'
]);

// Slot keys show up on the right-hand side of unrelated assignments (e.g. `slot = 'main'`).
const SLOT_NAMES = new Set([
  'main',
  'sub',
  'range',
  'ammo',
  'head',
  'neck',
  'ear1',
  'ear2',
  'left_ear',
  'right_ear',
  'body',
  'hands',
  'ring1',
  'ring2',
  'left_ring',
  'right_ring',
  'back',
  'waist',
  'legs',
  'feet'
]);

export function isValidItemName(name: string): boolean {
  if (name.length < 2) return false;
  const lower = name.toLowerCase();
  if (NON_ITEM_VALUES.has(lower)) return false;
  if (name.includes('(') || name.includes(')')) return false;
  if (/^\d+$/.test(name)) return false;
  if (SLOT_NAMES.has(lower)) return false;
  return true;
}

function isKind(token: Token | undefined, kind: Token['kind']): token is Token {
  return token !== undefined && token.kind === kind;
}

function isKeyword(token: Token | undefined, keyword: string): token is Token {
  return isKind(token, 'ident') && token.text.toLowerCase() === keyword;
}

/** `{ name = "X", augments = { ... } }` starting at an `open` token. */
export function matchAugmentedBlock(tokens: Token[], index: number, source: string): Reference | undefined {
  const [open, nameKey, nameAssign, nameValue, comma, augKey, augAssign, augOpen] = tokens.slice(index, index + 8);
  if (
    !isKind(open, 'open') ||
    !isKeyword(nameKey, 'name') ||
    !isKind(nameAssign, 'assign') ||
    !isKind(nameValue, 'string') ||
    !isKind(comma, 'comma') ||
    !isKeyword(augKey, 'augments') ||
    !isKind(augAssign, 'assign') ||
    !isKind(augOpen, 'open')
  ) {
    return undefined;
  }

  let closeIndex = index + 8;
  while (closeIndex < tokens.length && tokens[closeIndex].kind !== 'close') {
    if (tokens[closeIndex].kind === 'open') return undefined;
    closeIndex++;
  }
  const augClose = tokens[closeIndex];
  if (augClose === undefined) return undefined;

  let tail = closeIndex + 1;
  if (isKind(tokens[tail], 'comma')) tail++;
  if (!isKind(tokens[tail], 'close')) return undefined;

  const name = nameValue.text.trim();
  if (!isValidItemName(name)) return undefined;
  return createReference(name, source.slice(augOpen.end, augClose.start).trim());
}

/** `slot = "X"` or `slot = 'X'`; the `name` key only ever belongs to an augmented block. */
export function matchSimpleAssignment(tokens: Token[], index: number): Reference | undefined {
  const [key, assign, value] = tokens.slice(index, index + 3);
  if (!isKind(key, 'ident') || !isKind(assign, 'assign') || !isKind(value, 'string')) {
    return undefined;
  }
  if (key.text.toLowerCase() === 'name') return undefined;

  const name = value.text.trim();
  return isValidItemName(name) ? createReference(name) : undefined;
}

export function extractReferences(text: string): ReferenceSet {
  const tokens = tokenize(text);
  const references = new ReferenceSet();

  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i].kind !== 'open') continue;
    const reference = matchAugmentedBlock(tokens, i, text);
    if (reference) references.add(reference);
  }

  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i].kind !== 'ident') continue;
    const reference = matchSimpleAssignment(tokens, i);
    if (reference) references.add(reference);
  }

  return references;
}

export function extractAll(texts: Iterable<string>): ReferenceSet {
  const references = new ReferenceSet();
  for (const text of texts) {
    references.addAll(extractReferences(text));
  }
  return references;
}

/** A directory yields its top-level `.lua` files, sorted; any other path is returned as given. */
export async function discoverScriptFiles(path: string): Promise<string[]> {
  if (!(await isDirectory(path))) return [path];
  const files = await fg(['*.lua'], {
    cwd: resolve(path),
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false
  });
  return files.sort();
}

export async function extractFromFile(path: string): Promise<SourceExtraction> {
  let text: string;
  try {
    text = await readTextLenient(path);
  } catch (error) {
    return { status: 'unreadable', source: path, error: new SourceUnreadableError(path, error) };
  }
  return { status: 'ok', source: path, references: extractReferences(text) };
}

export async function extractFromSources(paths: readonly string[]): Promise<BatchExtraction> {
  const references = new ReferenceSet();
  const sources: SourceSummary[] = [];
  const failures: SourceFailure[] = [];

  for (const path of paths) {
    const result = await extractFromFile(path);
    if (result.status === 'unreadable') {
      log.warn('Skipping unreadable script source', { source: path, error: result.error.message });
      failures.push({ source: path, message: result.error.message });
      continue;
    }
    if (!result.references.size) {
      log.debug('No gear references recognised in script', { source: path });
    }
    references.addAll(result.references);
    sources.push({ source: path, references: result.references.size });
  }

  log.info('Script extraction complete', {
    sources: sources.length,
    failed: failures.length,
    references: references.size,
    augmented: references.augmentedCount
  });

  return { references, sources, failures };
}
