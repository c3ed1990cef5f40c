export function redactToken(token: string, opts?: { prefix?: number; suffix?: number }): string {
  const prefix = opts?.prefix ?? 6;
  const suffix = opts?.suffix ?? 4;
  if (token.length <= prefix + suffix + 3) return "***";
  return `${token.slice(0, prefix)}...${token.slice(-suffix)}`;
}

/**
 * Replace every occurrence of a secret inside a larger string (URLs, error
 * messages) with its redacted form.
 */
export function redactSecretIn(text: string, secret: string | null | undefined): string {
  if (!secret) return text;
  return text.split(secret).join(redactToken(secret));
}

export function safeErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
