export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return normalizeWhitespace(message);
}
