/**
 * `${token}` placeholder substitution.
 */

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z0-9_]+)\}/g;

/**
 * Replace every `${token}` in body with its value.
 *
 * One scan over the body: inserted values are never rescanned, so the order
 * of the tokens does not matter. Values are inserted literally.
 * Placeholders without a value in `values` are left as they are.
 */
export function renderTemplate(
  body: string,
  values: Readonly<Record<string, string>>
): string {
  return body.replace(PLACEHOLDER_PATTERN, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match
  );
}

/**
 * List the distinct placeholder names still present in body, in order of
 * first appearance.
 */
export function findPlaceholders(body: string): string[] {
  const names = new Set<string>();
  for (const match of body.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
