/**
 * Helpers reading environment variables with forgiving coercion rules: blank
 * values count as unset and unparsable literals fall back to the default.
 */

/** Normalises the raw value retrieved from {@link process.env}. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
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

/** Reads the variable as a base-10 integer, returning the default when invalid. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  // Literals beyond the safe-integer range would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed value when {@link name} is set to a non-empty string. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively.
 * Unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }

  return lookup.get(normalised.toLowerCase());
}

/** Same as {@link readOptionalEnum} with a fallback. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
