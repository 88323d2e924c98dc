const FILE_SCHEME = "file://";
const URL_PREFIX = "http:";

/**
 * Turn a `file://` URI into a plain path. Anything else is returned as given.
 */
export function normalizeTargetPath(input: string): string {
  return input.startsWith(FILE_SCHEME) ? input.slice(FILE_SCHEME.length) : input;
}

function isTerminator(char: string): boolean {
  return char === '"' || char === "\n" || char === "\r";
}

/**
 * Find the first `http:` token in `text`, running up to the next double quote,
 * line break or end of input. A bare `http:` with nothing after it is skipped.
 */
export function extractFirstUrl(text: string): string | undefined {
  let from = 0;

  for (;;) {
    const start = text.indexOf(URL_PREFIX, from);
    if (start === -1) return undefined;

    let end = start + URL_PREFIX.length;
    while (end < text.length && !isTerminator(text[end])) {
      end++;
    }

    if (end > start + URL_PREFIX.length) {
      return text.slice(start, end);
    }
    from = end;
  }
}
