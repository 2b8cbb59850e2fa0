/**
 * Environment readers shared by every configuration block. Values are trimmed,
 * blank values count as unset and anything unparsable falls back to the
 * caller's default.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Normalises the raw value retrieved from {@link process.env}. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads {@link name} as a boolean. Accepts "1/true/yes/on" and "0/false/no/off"
 * in any case; anything else yields {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

export interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Reads a base-10 integer. Out-of-range values count as invalid. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

/** Returns the trimmed value, or `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling.
 */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}

/**
 * Splits a CSV literal into a deduplicated (case-insensitive) list, keeping
 * the first spelling and the insertion order.
 */
export function parseCsvList(value: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const segment of value.split(",")) {
    const item = segment.trim();
    const lower = item.toLowerCase();
    if (item.length === 0 || seen.has(lower)) {
      continue;
    }
    seen.add(lower);
    ordered.push(item);
  }
  return ordered;
}
