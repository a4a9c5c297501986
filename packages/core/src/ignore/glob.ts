import { PatternError } from '../errors.js';
import { normalizePatternPath } from '../path/normalize.js';

/**
 * Glob syntax, matched against whole normalized relative paths:
 *
 * - `*` any run of characters inside one segment, `?` one character other than `/`
 * - `**` as a whole segment: `**` + `/` spans zero or more directories, a trailing
 *   `/` + `**` covers the path itself and everything below it
 * - `[abc]`, `[a-z]`, `[!a-z]` (or `[^a-z]`) character classes, never matching `/`
 * - `{a,b}` alternation, not nested
 * - a trailing `/` is shorthand for a trailing `/` + `**`
 */

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|/]/;

function escapeChar(ch: string): string {
  return REGEX_SPECIAL.test(ch) ? `\\${ch}` : ch;
}

function escapeClassChar(ch: string): string {
  return ch === '\\' || ch === ']' || ch === '[' || ch === '^' || ch === '-' ? `\\${ch}` : ch;
}

interface Translated {
  source: string;
  next: number;
}

class GlobTranslator {
  private readonly chars: string[];

  constructor(private readonly raw: string, pattern: string) {
    this.chars = Array.from(pattern);
  }

  translate(): string {
    const { source, next } = this.sequence(0, false, true);
    if (next !== this.chars.length) {
      throw new PatternError(this.raw, `unexpected '${this.chars[next]}'`);
    }
    return source;
  }

  private fail(problem: string): never {
    throw new PatternError(this.raw, problem);
  }

  private endsAlternative(index: number, inBrace: boolean): boolean {
    if (index >= this.chars.length) return true;
    return inBrace && (this.chars[index] === ',' || this.chars[index] === '}');
  }

  private sequence(start: number, inBrace: boolean, startsAtBoundary: boolean): Translated {
    const { chars } = this;
    let out = '';
    let i = start;

    while (i < chars.length) {
      const ch = chars[i];
      const atBoundary = i === start ? startsAtBoundary : chars[i - 1] === '/';

      if (inBrace && (ch === ',' || ch === '}')) break;

      if (ch === '*' && chars[i + 1] === '*') {
        if (!atBoundary) this.fail("'**' must be a whole path segment");
        const after = i + 2;
        if (chars[after] === '/') {
          out += '(?:.*/)?';
          i = after + 1;
        } else if (this.endsAlternative(after, inBrace)) {
          out += '.*';
          i = after;
        } else {
          this.fail("'**' must be a whole path segment");
        }
        continue;
      }

      if (ch === '/' && chars[i + 1] === '*' && chars[i + 2] === '*' && this.endsAlternative(i + 3, inBrace)) {
        out += '(?:/.*)?';
        i += 3;
        continue;
      }

      switch (ch) {
        case '*':
          out += '[^/]*';
          i += 1;
          break;
        case '?':
          out += '[^/]';
          i += 1;
          break;
        case '[': {
          const cls = this.characterClass(i);
          out += cls.source;
          i = cls.next;
          break;
        }
        case '{': {
          if (inBrace) this.fail('nested alternation is not supported');
          const alt = this.alternation(i, atBoundary);
          out += alt.source;
          i = alt.next;
          break;
        }
        default:
          out += escapeChar(ch);
          i += 1;
      }
    }

    return { source: out, next: i };
  }

  private alternation(open: number, atBoundary: boolean): Translated {
    const options: string[] = [];
    let i = open + 1;

    for (;;) {
      const part = this.sequence(i, true, atBoundary);
      options.push(part.source);
      const stop = this.chars[part.next];
      if (stop === ',') {
        i = part.next + 1;
      } else if (stop === '}') {
        return { source: `(?:${options.join('|')})`, next: part.next + 1 };
      } else {
        this.fail("unclosed alternation '{'");
      }
    }
  }

  private characterClass(open: number): Translated {
    const { chars } = this;
    let i = open + 1;
    let negated = false;
    if (chars[i] === '!' || chars[i] === '^') {
      negated = true;
      i += 1;
    }

    let body = '';
    let first = true;
    for (;;) {
      if (i >= chars.length) this.fail("unclosed character class '['");
      const ch = chars[i];
      if (ch === ']' && !first) break;
      first = false;

      if (chars[i + 1] === '-' && i + 2 < chars.length && chars[i + 2] !== ']') {
        const to = chars[i + 2];
        const lo = ch.codePointAt(0) ?? 0;
        const hi = to.codePointAt(0) ?? 0;
        if (lo > hi) this.fail(`invalid character range '${ch}-${to}'`);
        body += `${escapeClassChar(ch)}-${escapeClassChar(to)}`;
        i += 3;
        continue;
      }

      body += escapeClassChar(ch);
      i += 1;
    }

    const source = negated ? `[^/${body}]` : `(?!/)[${body}]`;
    return { source, next: i + 1 };
  }
}

/** Compile one ignore pattern into an anchored expression over normalized relative paths. */
export function compileGlob(raw: string): RegExp {
  if (raw.trim().length === 0) {
    throw new PatternError(raw, 'empty pattern');
  }
  if (raw.startsWith('!')) {
    throw new PatternError(raw, 'negation patterns are not supported');
  }

  let pattern = normalizePatternPath(raw);
  if (pattern.length === 0) {
    throw new PatternError(raw, 'pattern matches no relative path');
  }
  if (pattern.endsWith('/')) {
    pattern = `${pattern}**`;
  }

  const source = new GlobTranslator(raw, pattern).translate();
  return new RegExp(`^${source}$`, 'su');
}
