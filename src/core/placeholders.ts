/**
 * Masks format-sensitive substrings (markup tags, printf directives, brace
 * interpolation) before text goes to a translation engine, and puts them back
 * afterwards.
 *
 * Each shielded substring is replaced by a marker `{N}`. Since every
 * non-empty `{...}` run in the input is itself shielded, anything in the
 * masked text that looks like a marker is one.
 */

export type PlaceholderKind = 'tag' | 'printf-named' | 'printf' | 'double-brace' | 'brace';

export interface PlaceholderMatcher {
  kind: PlaceholderKind;
  /** Must carry the sticky flag; it is matched at one position at a time. */
  pattern: RegExp;
}

/** token -> original substring */
export type PlaceholderMap = Map<string, string>;

export interface ShieldResult {
  masked: string;
  placeholders: PlaceholderMap;
}

/**
 * Precedence among grammars. At every position the longest match wins;
 * between matches of equal length the earlier matcher wins.
 */
export const PLACEHOLDER_MATCHERS: readonly PlaceholderMatcher[] = [
  // <b>, </b>, <br/>, <a href="...">, <{strong}>; "1 < 2" is not a tag
  { kind: 'tag', pattern: /<\/?[A-Za-z{][^<>]*>/y },
  // %(name)s, %(pct).2f
  { kind: 'printf-named', pattern: /%\([^)]+\)[#0+-]*\d*(?:\.\d+)?[diouxXeEfFgGcrs]/y },
  // %s, %d, %1$s, %.2f, %%
  { kind: 'printf', pattern: /%(?:\d+\$)?[#0+-]*\d*(?:\.\d+)?[diouxXeEfFgGcs%]/y },
  { kind: 'double-brace', pattern: /\{\{[^{}]+\}\}/y },
  { kind: 'brace', pattern: /\{[^{}]+\}/y },
];

// Engines occasionally pad markers with spaces: "{ 0 }".
const MARKER_PATTERN = /\{\s*(\d+)\s*\}/g;

export function markerToken(index: number): string {
  return `{${index}}`;
}

function matchAt(text: string, position: number, matchers: readonly PlaceholderMatcher[]): string | undefined {
  let best: string | undefined;
  for (const matcher of matchers) {
    matcher.pattern.lastIndex = position;
    const found = matcher.pattern.exec(text);
    // Strictly longer only: on equal length the earlier matcher keeps the match.
    if (found && (best === undefined || found[0].length > best.length)) {
      best = found[0];
    }
  }
  return best;
}

export function shield(text: string, matchers: readonly PlaceholderMatcher[] = PLACEHOLDER_MATCHERS): ShieldResult {
  const placeholders: PlaceholderMap = new Map();
  let masked = '';
  let position = 0;

  while (position < text.length) {
    const match = matchAt(text, position, matchers);
    if (match) {
      const token = markerToken(placeholders.size);
      placeholders.set(token, match);
      masked += token;
      position += match.length;
    } else {
      masked += text[position];
      position++;
    }
  }

  return { masked, placeholders };
}

export function unshield(masked: string, placeholders: PlaceholderMap): string {
  if (placeholders.size === 0) {
    return masked;
  }
  return masked.replace(MARKER_PATTERN, (marker: string, index: string) => {
    return placeholders.get(markerToken(Number(index))) ?? marker;
  });
}

/**
 * Markers that do not occur exactly once in `masked`. A non-empty result
 * means the engine dropped or duplicated a placeholder.
 */
export function findMissingMarkers(masked: string, placeholders: PlaceholderMap): string[] {
  const counts = new Map<string, number>();
  for (const found of masked.matchAll(MARKER_PATTERN)) {
    const token = markerToken(Number(found[1]));
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return [...placeholders.keys()].filter(token => counts.get(token) !== 1);
}

export function stripMarkers(masked: string): string {
  return masked.replace(MARKER_PATTERN, '');
}
