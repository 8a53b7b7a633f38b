/** Matches a base URL that already names an API version: /v1, /v2beta, /v1alpha... */
const VERSION_SUFFIX = /\/v\d+[a-z]*$/;

/**
 * Joins a configured base URL and a dialect endpoint.
 *
 * A trailing `#` on the base URL means "use as given": no `/v1` is inserted.
 * Otherwise `/v1` is inserted unless the base already ends in a version
 * segment. The inbound query string, when present, is appended last.
 */
export function buildUpstreamUrl(baseUrl: string, endpoint: string, query?: string): string {
  let base = baseUrl.trim().replace(/\/$/, '');
  const verbatim = base.endsWith('#');
  if (verbatim) {
    base = base.slice(0, -1).replace(/\/$/, '');
  }
  const versionPrefix = verbatim || VERSION_SUFFIX.test(base) ? '' : '/v1';
  const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  let url = `${base}${versionPrefix}${path}`;

  const search = query?.replace(/^\?/, '') ?? '';
  if (search) {
    url += `${url.includes('?') ? '&' : '?'}${search}`;
  }
  return url;
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}
