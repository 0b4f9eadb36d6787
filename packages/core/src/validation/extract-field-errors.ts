/**
 * Extract field-level errors from Zod issues into Record<string, string[]>.
 * Maps each issue's path to a dot-separated key with its error message.
 */
export function extractFieldErrors(
  issues: ReadonlyArray<{
    readonly path: PropertyKey[];
    readonly message: string;
  }>,
): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of issues) {
    const key = issue.path.length > 0 ? issue.path.map(String).join('.') : '_root';
    const messages = fieldErrors[key] ?? [];
    messages.push(issue.message);
    fieldErrors[key] = messages;
  }
  return fieldErrors;
}
