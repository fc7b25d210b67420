export type TokenKind = 'ident' | 'string' | 'assign' | 'open' | 'close' | 'comma' | 'other';

export interface Token {
  kind: TokenKind;
  /** Identifier text, string contents without the quotes, or the raw characters. */
  text: string;
  start: number;
  end: number;
}

const COMPARISON_PREFIXES = new Set(['=', '~', '<', '>']);

function isIdentStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isIdentPart(char: string): boolean {
  return /[A-Za-z0-9_]/.test(char);
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isSpace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';
}

// Returns the index of the closing quote, or -1 when the line ends first.
function findClosingQuote(source: string, openAt: number): number {
  const quote = source[openAt];
  for (let i = openAt + 1; i < source.length; i++) {
    const char = source[i];
    if (char === '\\') {
      i++;
      continue;
    }
    if (char === '\n' || char === '\r') return -1;
    if (char === quote) return i;
  }
  return -1;
}

/**
 * Single forward pass over script text. Strings never span a line, so an
 * apostrophe inside a comment only costs one `other` token.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    if (isSpace(char)) {
      i++;
      continue;
    }

    if (isIdentStart(char)) {
      let end = i + 1;
      while (end < source.length && isIdentPart(source[end])) end++;
      tokens.push({ kind: 'ident', text: source.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (isDigit(char)) {
      let end = i + 1;
      while (end < source.length && isDigit(source[end])) end++;
      tokens.push({ kind: 'other', text: source.slice(i, end), start: i, end });
      i = end;
      continue;
    }

    if (char === '"' || char === "'") {
      const close = findClosingQuote(source, i);
      if (close !== -1) {
        tokens.push({ kind: 'string', text: source.slice(i + 1, close), start: i, end: close + 1 });
        i = close + 1;
        continue;
      }
      tokens.push({ kind: 'other', text: char, start: i, end: i + 1 });
      i++;
      continue;
    }

    if (COMPARISON_PREFIXES.has(char) && source[i + 1] === '=') {
      tokens.push({ kind: 'other', text: source.slice(i, i + 2), start: i, end: i + 2 });
      i += 2;
      continue;
    }

    const kind: TokenKind =
      char === '=' ? 'assign' : char === '{' ? 'open' : char === '}' ? 'close' : char === ',' ? 'comma' : 'other';
    tokens.push({ kind, text: char, start: i, end: i + 1 });
    i++;
  }

  return tokens;
}
