/**
 * Flat `{field}` placeholder substitution for message templates.
 *
 * - `{name}` is replaced with `fields[name]`; absent or empty fields become ''
 * - `{{` and `}}` produce literal braces
 * - anything else (`{ name }`, `{0}`, a lone brace) is left as written
 */
const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function formatMessage(template: string, fields: Readonly<Record<string, string | undefined>>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string | undefined) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name === undefined || !Object.prototype.hasOwnProperty.call(fields, name)) {
      return '';
    }
    return fields[name] ?? '';
  });
}
