const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Read an integer setting. Unset, non-integer (including `"12px"`) or
 * below-`minimum` values fall back.
 */
export function parseInteger(raw: string | undefined, fallback: number, minimum = 1): number {
  const trimmed = raw?.trim();
  if (!trimmed || !INTEGER_PATTERN.test(trimmed)) {
    return fallback;
  }

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) && parsed >= minimum ? parsed : fallback;
}

/** Value after `--name` in an argv list; `undefined` when absent or last. */
export function readFlag(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  return value === undefined || value.startsWith("--") ? undefined : value;
}

export function safeErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message.trim() : "";
  const raw = message.length > 0 ? message : String(error);
  // One log line per error.
  return raw.replace(/[\u0000-\u001f\u007f]+/g, " ").trim();
}

export function formatHex32(value: number): string {
  return `0x${(value >>> 0).toString(16).padStart(8, "0")}`;
}
