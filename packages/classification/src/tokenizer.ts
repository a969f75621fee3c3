/**
 * URL Tokenizer
 *
 * Breaks a URL into the ordered tokens filters are matched against:
 * host labels, path segments, query fragments, then the fragment.
 * The scheme and the undivided host/path/query strings are never tokens.
 *
 * Tokens are cut from the URL exactly as written: nothing is lowercased,
 * percent-encoded or normalized, and `.`/`..` segments stay in place.
 */

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Split `text` at the first `separator`
 */
function splitOnce(text: string, separator: string): [string, string] {
  const index = text.indexOf(separator);
  return index === -1 ? [text, ''] : [text.slice(0, index), text.slice(index + 1)];
}

/**
 * Host of an authority, without userinfo or port
 */
function hostOf(authority: string): string {
  const host = authority.slice(authority.lastIndexOf('@') + 1);
  if (host.startsWith('[')) {
    const end = host.indexOf(']');
    return end === -1 ? host : host.slice(0, end + 1);
  }
  const port = host.lastIndexOf(':');
  return port === -1 ? host : host.slice(0, port);
}

export function tokenize(url: string): string[] {
  const [beforeFragment, fragment] = splitOnce(url.trim().replace(SCHEME_PATTERN, ''), '#');
  const [beforeQuery, query] = splitOnce(beforeFragment, '?');
  const slash = beforeQuery.indexOf('/');
  const authority = slash === -1 ? beforeQuery : beforeQuery.slice(0, slash);
  const path = slash === -1 ? '' : beforeQuery.slice(slash);

  const host = hostOf(authority);
  const tokens: string[] = host.startsWith('[') ? [host] : host.split('.').filter(Boolean);

  tokens.push(...path.split('/').filter(Boolean));
  tokens.push(...query.split('&').filter(Boolean));

  if (fragment) {
    tokens.push(fragment);
  }

  return tokens;
}
