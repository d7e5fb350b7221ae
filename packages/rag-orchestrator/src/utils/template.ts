/**
 * Substitute `{name}` placeholders in one pass, so values that themselves
 * contain braces or `$` sequences are inserted verbatim
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}
