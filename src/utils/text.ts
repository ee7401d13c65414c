// Identifier normalization helpers with no external deps

function splitWords(input: string): string[] {
  return (input || "")
    .trim()
    // break camelCase and PascalCase boundaries before splitting on separators
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean);
}

/** `list_emails`, `listEmails` and `ListEmails` all become `ListEmails`. */
export function toPascalCase(input: string): string {
  return splitWords(input)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join("");
}

export function isBlank(value: string | undefined | null): boolean {
  return !value || value.trim().length === 0;
}
