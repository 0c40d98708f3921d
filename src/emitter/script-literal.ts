import type { ScriptContextEscaping } from '../architecture';

/**
 * Quote character wrapped around the escaped text, or `null` for a bare body.
 */
export type LiteralQuote = '"' | "'" | null;

const SIMPLE_ESCAPES = new Map<number, string>([
  [0x08, '\\b'],
  [0x09, '\\t'],
  [0x0a, '\\n'],
  [0x0c, '\\f'],
  [0x0d, '\\r'],
  [0x5c, '\\\\'],
  // `</` is what closes a script element; `\/` keeps the slash inert.
  [0x2f, '\\/']
]);

/**
 * Characters that are escaped as `\uXXXX` even though they are legal inside a
 * string literal, because an HTML parser or an older script engine would see
 * them first: `<`, `>`, `&`, LINE SEPARATOR, PARAGRAPH SEPARATOR.
 */
const MARKUP_SENSITIVE = new Set<number>([0x3c, 0x3e, 0x26, 0x2028, 0x2029]);

function unicodeEscape(codeUnit: number): string {
  return `\\u${codeUnit.toString(16).toUpperCase().padStart(4, '0')}`;
}

function isHighSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdbff;
}

function isLowSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xdc00 && codeUnit <= 0xdfff;
}

function escapeQuote(codeUnit: number, quote: LiteralQuote): string | undefined {
  const char = String.fromCharCode(codeUnit);
  if (char !== '"' && char !== "'" && char !== '`') return undefined;
  // A bare body may end up inside either quote style.
  if (quote === null || char === quote) return `\\${char}`;
  return undefined;
}

/**
 * Escapes text for embedding as a script string literal inside an HTML
 * `<script>` element.
 *
 * See {@link ScriptContextEscaping} for the rules and why each class of
 * character is covered.
 *
 * @param text
 *   Arbitrary developer-supplied text (a target path, a member key).
 * @param quote
 *   Quote style to wrap the result in. With `null` the bare body is returned
 *   and every quote style is escaped.
 * @returns
 *   The escaped literal, e.g. `"a\"b"` for `a"b` with `"`.
 *
 * @example
 * ```ts
 * escapeScriptStringLiteral('</script>', '"'); // "\u003C\/script\u003E"
 * ```
 */
export function escapeScriptStringLiteral(
  text: string,
  quote: LiteralQuote = '"'
): string {
  let body = '';

  for (let index = 0; index < text.length; index++) {
    const codeUnit = text.charCodeAt(index);

    const simple = SIMPLE_ESCAPES.get(codeUnit);
    if (simple !== undefined) {
      body += simple;
      continue;
    }

    const quoted = escapeQuote(codeUnit, quote);
    if (quoted !== undefined) {
      body += quoted;
      continue;
    }

    if (
      codeUnit < 0x20 ||
      codeUnit === 0x7f ||
      MARKUP_SENSITIVE.has(codeUnit)
    ) {
      body += unicodeEscape(codeUnit);
      continue;
    }

    if (isHighSurrogate(codeUnit)) {
      const next = text.charCodeAt(index + 1);
      if (isLowSurrogate(next)) {
        body += text[index] + text[index + 1];
        index++;
      } else {
        body += unicodeEscape(codeUnit);
      }
      continue;
    }

    if (isLowSurrogate(codeUnit)) {
      body += unicodeEscape(codeUnit);
      continue;
    }

    body += text[index];
  }

  return quote === null ? body : `${quote}${body}${quote}`;
}

/**
 * Escapes text for a double-quoted HTML attribute value.
 */
export function escapeHtmlAttribute(text: string): string {
  return text
    .replaceAll('&', '&amp;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;');
}
