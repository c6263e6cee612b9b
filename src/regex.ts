/**
 * Patterns that come from the command line run on RE2, so a scan is linear in
 * the input whatever the pattern; backreferences and lookaround are rejected
 * when the pattern is compiled.
 *
 * Syntax is RE2's: inline flag groups such as `(?i)`, `(?s)` and `(?U)`,
 * `(?P<name>…)` and `\p{…}` classes all work.
 */

import { RE2 } from 're2-wasm';
import { ValidationError } from './validation.js';

export interface RegexMatch {
  index: number;
  end: number;
  /** Whole match, then one entry per capture group (undefined when the group did not take part). */
  captures: Array<string | undefined>;
  groups?: Record<string, string | undefined>;
}

function compile(pattern: string, field: string): RE2 {
  try {
    return new RE2(pattern, 'gu');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(message, field);
  }
}

export class UserRegex {
  private readonly re: RE2;

  constructor(
    readonly pattern: string,
    field: string
  ) {
    this.re = compile(pattern, field);
  }

  /**
   * Leftmost non-overlapping matches, left to right. An empty match that starts
   * where the previous match ended is skipped, so `a*` finds 3 matches in `baaac`.
   */
  scan(input: string): RegexMatch[] {
    const found: RegexMatch[] = [];
    let pos = 0;
    let prevEnd = -1;
    while (pos <= input.length) {
      this.re.lastIndex = pos;
      const m = this.re.exec(input);
      if (m === null) break;

      const index = m.index;
      const end = index + m[0].length;
      let accept = true;
      if (end === pos) {
        // empty match at pos
        if (index === prevEnd) accept = false;
        pos += 1;
      } else {
        pos = end;
      }
      prevEnd = end;

      if (accept) {
        found.push({ index, end, captures: Array.from(m), groups: m.groups });
      }
    }
    return found;
  }

  /** Replaces every match found by scan(), expanding `$` references in template. */
  replace(input: string, template: string): string {
    let out = '';
    let last = 0;
    for (const m of this.scan(input)) {
      out += input.slice(last, m.index) + expandTemplate(template, m, input);
      last = m.end;
    }
    return out + input.slice(last);
  }
}

/**
 * `$$`, `$&`, `` $` ``, `$'`, `$1`…`$99` and `$<name>`, resolved the way
 * String.prototype.replace resolves them. Anything else is copied as is.
 */
export function expandTemplate(template: string, m: RegexMatch, input: string): string {
  const groupCount = m.captures.length - 1;
  let out = '';
  let i = 0;
  while (i < template.length) {
    const c = template[i];
    if (c !== '$' || i + 1 >= template.length) {
      out += c;
      i += 1;
      continue;
    }

    const next = template[i + 1];
    if (next === '$') {
      out += '$';
      i += 2;
    } else if (next === '&') {
      out += m.captures[0] ?? '';
      i += 2;
    } else if (next === '`') {
      out += input.slice(0, m.index);
      i += 2;
    } else if (next === "'") {
      out += input.slice(m.end);
      i += 2;
    } else if (next >= '0' && next <= '9') {
      const two = template.slice(i + 1, i + 3);
      const twoDigit = /^\d\d$/.test(two) ? parseInt(two, 10) : 0;
      const oneDigit = parseInt(next, 10);
      if (twoDigit >= 1 && twoDigit <= groupCount) {
        out += m.captures[twoDigit] ?? '';
        i += 3;
      } else if (oneDigit >= 1 && oneDigit <= groupCount) {
        out += m.captures[oneDigit] ?? '';
        i += 2;
      } else {
        out += '$';
        i += 1;
      }
    } else if (next === '<' && m.groups !== undefined) {
      const close = template.indexOf('>', i + 2);
      if (close === -1) {
        out += '$';
        i += 1;
      } else {
        out += m.groups[template.slice(i + 2, close)] ?? '';
        i = close + 1;
      }
    } else {
      out += '$';
      i += 1;
    }
  }
  return out;
}
