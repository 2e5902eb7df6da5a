/**
 * Query String Parsing
 *
 * Pieces are split on '&', then on the first '='. Values are kept
 * verbatim: no percent-decoding and no '+' to space conversion.
 */

export function parseQueryString(queryString: string): Map<string, string> {
  const params = new Map<string, string>();
  const query = queryString.startsWith('?') ? queryString.slice(1) : queryString;

  for (const piece of query.split('&')) {
    if (piece === '') continue;

    const eq = piece.indexOf('=');
    if (eq === -1) {
      params.set(piece, '');
    } else {
      params.set(piece.slice(0, eq), piece.slice(eq + 1));
    }
  }

  return params;
}
