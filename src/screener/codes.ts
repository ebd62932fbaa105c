export const DEFAULT_EXCHANGE_SUFFIX = ".T";

const LOCAL_CODE_RE = /^[0-9]{4}$/;

/**
 * Normalize free-text ticker input into exchange-qualified symbols.
 *
 * Tokens are separated by commas and/or newlines. A bare 4-digit local code gets
 * `suffix` appended ("7203" → "7203.T"); anything else passes through verbatim, so
 * already-qualified or foreign symbols are accepted and malformed tokens simply
 * fail at fetch time. Result is deduplicated and sorted.
 */
export function parseCodes(text: string, suffix: string = DEFAULT_EXCHANGE_SUFFIX): string[] {
  const symbols = new Set<string>();
  for (const raw of text.split(/[,\r\n]/)) {
    const token = raw.trim();
    if (!token) continue;
    symbols.add(LOCAL_CODE_RE.test(token) ? token + suffix : token);
  }
  return [...symbols].sort();
}

/** "7203.T" → "7203". Symbols without the suffix are returned unchanged. */
export function stripSuffix(symbol: string, suffix: string = DEFAULT_EXCHANGE_SUFFIX): string {
  return suffix && symbol.endsWith(suffix) ? symbol.slice(0, -suffix.length) : symbol;
}
