/**
 * Query string construction for BirdDog endpoints
 */

export type QueryPair = readonly [key: string, value: string];

/**
 * Percent-encode a query value, leaving `@`, `:` and `/` readable.
 * They are legal inside a query component, and the API receives e-mail user
 * names and MM/dd/yyyy dates verbatim.
 */
export function encodeQueryValue(value: string): string {
  return encodeURIComponent(value)
    .replace(/%40/g, '@')
    .replace(/%3A/gi, ':')
    .replace(/%2F/gi, '/');
}

/** Keys keep literal brackets so indexed names read `userName[0]` */
export function encodeQueryKey(key: string): string {
  return encodeURIComponent(key).replace(/%5B/gi, '[').replace(/%5D/gi, ']');
}

export function buildQueryString(pairs: readonly QueryPair[]): string {
  return pairs.map(([key, value]) => `${encodeQueryKey(key)}=${encodeQueryValue(value)}`).join('&');
}

/**
 * Array parameters are sent as name[0]=a&name[1]=b, in input order.
 *
 * @example
 * indexedParams('userName', ['a@x.com', 'b@y.com'])
 * // [['userName[0]', 'a@x.com'], ['userName[1]', 'b@y.com']]
 */
export function indexedParams(name: string, values: readonly string[]): QueryPair[] {
  return values.map((value, index): QueryPair => [`${name}[${index}]`, value]);
}

/** Local calendar date as MM/dd/yyyy */
export function formatSearchDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const year = String(date.getFullYear()).padStart(4, '0');
  return `${month}/${day}/${year}`;
}
