import type { BindValues } from '../types';

export type BoundStatement = {
  /**
   * SQL with every `:ITEM` reference replaced by a positional `$n` parameter.
   */
  text: string;

  /**
   * Parameter values in `$n` order.
   */
  values: unknown[];

  /**
   * Upper-cased names referenced by the statement but absent from the binds.
   * They are bound as `null`.
   */
  unresolved: string[];
};

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_$#]/;

/**
 * Returns the index right after the construct that starts at `start`, or
 * `start` itself when no quoted or commented region begins there.
 */
function skipInert(sql: string, start: number): number {
  const char = sql[start];
  const next = sql[start + 1];

  if (char === "'" || char === '"') {
    // Doubled quotes escape themselves: 'it''s', "a""b".
    let i = start + 1;
    while (i < sql.length) {
      if (sql[i] === char) {
        if (sql[i + 1] === char) {
          i += 2;
          continue;
        }
        return i + 1;
      }
      i++;
    }
    return sql.length;
  }

  if (char === '-' && next === '-') {
    const end = sql.indexOf('\n', start + 2);
    return end === -1 ? sql.length : end;
  }

  if (char === '/' && next === '*') {
    const end = sql.indexOf('*/', start + 2);
    return end === -1 ? sql.length : end + 2;
  }

  if (char === '$') {
    const tag = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.slice(start));
    if (tag) {
      const end = sql.indexOf(tag[0], start + tag[0].length);
      return end === -1 ? sql.length : end + tag[0].length;
    }
  }

  return start;
}

/**
 * Rewrites `:ITEM` references into positional parameters bound from session
 * item values.
 *
 * Rules
 * -----
 * - Names match case-insensitively (`:p1_deptno` reads `P1_DEPTNO`).
 * - A name referenced more than once shares one parameter.
 * - String literals, quoted identifiers, comments, dollar-quoted bodies and
 *   `::type` casts are left untouched.
 *
 * @example
 * ```ts
 * bindSessionItems('select * from emp where deptno = :P1_DEPTNO', { P1_DEPTNO: 10 });
 * // { text: 'select * from emp where deptno = $1', values: [10], unresolved: [] }
 * ```
 */
export function bindSessionItems(
  sql: string,
  binds: BindValues
): BoundStatement {
  const lookup = new Map<string, unknown>();
  for (const [name, value] of Object.entries(binds)) {
    lookup.set(name.toUpperCase(), value);
  }

  const positions = new Map<string, number>();
  const values: unknown[] = [];
  const unresolved: string[] = [];
  let text = '';
  let i = 0;

  while (i < sql.length) {
    const inertEnd = skipInert(sql, i);
    if (inertEnd > i) {
      text += sql.slice(i, inertEnd);
      i = inertEnd;
      continue;
    }

    const char = sql.charAt(i);

    if (char === ':' && sql[i + 1] === ':') {
      text += '::';
      i += 2;
      continue;
    }

    if (char === ':' && NAME_START.test(sql.charAt(i + 1))) {
      let end = i + 2;
      while (end < sql.length && NAME_PART.test(sql.charAt(end))) end++;

      const name = sql.slice(i + 1, end).toUpperCase();
      let position = positions.get(name);
      if (position === undefined) {
        values.push(lookup.has(name) ? lookup.get(name) : null);
        position = values.length;
        positions.set(name, position);
        if (!lookup.has(name)) unresolved.push(name);
      }

      text += `$${position}`;
      i = end;
      continue;
    }

    text += char;
    i++;
  }

  return { text, values, unresolved };
}
