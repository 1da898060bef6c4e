/**
 * Pretty-print a JSON document with two-space indentation.
 *
 * @returns undefined when `text` is not valid JSON
 */
export function formatJson(text: string): string | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return JSON.stringify(value, null, 2);
  } catch {
    return undefined;
  }
}
