const SUMMARY_WORD_LIMIT = 12;
const KEY_POINT_MIN_LENGTH = 6;
const KEY_POINT_LIMIT = 6;

const EDGE_PUNCTUATION = /^[.,!?]+|[.,!?]+$/g;

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/** Orders strings by Unicode code point rather than UTF-16 code unit */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

/**
 * Keep the first twelve words. Shorter input comes back verbatim,
 * whitespace included.
 */
export function summarize(text: string): string {
  const words = tokenize(text);
  if (words.length <= SUMMARY_WORD_LIMIT) {
    return text;
  }
  return `${words.slice(0, SUMMARY_WORD_LIMIT).join(' ')} …`;
}

/**
 * Pick out the long words of a message as "key points".
 *
 * Words are stripped of surrounding `.,!?`, deduplicated case-sensitively
 * and sorted by code point (not locale). Length counts code points, so an
 * emoji is one character. At most six are listed.
 */
export function reflect(text: string): string {
  const longWords = tokenize(text)
    .map((word) => word.replace(EDGE_PUNCTUATION, ''))
    .filter((word) => Array.from(word).length >= KEY_POINT_MIN_LENGTH);

  const keyPoints = Array.from(new Set(longWords))
    .sort(compareCodePoints)
    .slice(0, KEY_POINT_LIMIT);

  if (keyPoints.length > 0) {
    return `key points → ${keyPoints.join(', ')}`;
  }
  return 'sounds interesting!';
}
