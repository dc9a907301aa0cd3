import { FieldValidationError } from "./errors.js";
import { CanonicalRecord, NumericField, RawFrame } from "./schema.js";
import { asInteger, asNumber, asString, baseName, clamp } from "./util.js";

export type SanitizeOptions = {
  /** Public reference to the local snapshot; wins over the previous record's value. */
  imageUrl?: string;
  onInvalidField?: (err: FieldValidationError) => void;
};

type NumericRule = {
  keys: readonly string[];
  integer: boolean;
  min: number;
  max: number;
};

export const TEMPERATURE_RANGE = {
  nozzle: { min: -20, max: 500 },
  bed: { min: -20, max: 200 },
} as const;

// First key present in the frame wins.
const NUMERIC_RULES: Record<NumericField, NumericRule> = {
  progress: { keys: ["progress", "printProgress"], integer: false, min: 0, max: 100 },
  layer: { keys: ["layer"], integer: true, min: 0, max: Number.MAX_SAFE_INTEGER },
  totalLayers: {
    keys: ["totalLayer", "total_layers", "TotalLayer", "totalLayers"],
    integer: true,
    min: 0,
    max: Number.MAX_SAFE_INTEGER,
  },
  elapsed: { keys: ["time", "elapsed", "printJobTime"], integer: true, min: 0, max: Number.MAX_SAFE_INTEGER },
  remaining: {
    keys: ["remainingTime", "remaining", "printLeftTime"],
    integer: true,
    min: 0,
    max: Number.MAX_SAFE_INTEGER,
  },
  nozzleTemp: { keys: ["nozzleTemp", "nozzle_temp"], integer: false, ...TEMPERATURE_RANGE.nozzle },
  bedTemp: { keys: ["bedTemp", "bedTemp0", "bed_temp"], integer: false, ...TEMPERATURE_RANGE.bed },
  usedFilament: {
    keys: ["usedMaterial", "usedMaterialLength", "used_filament"],
    integer: false,
    min: 0,
    max: Number.MAX_VALUE,
  },
};

const FILENAME_KEYS = ["printFileName", "filename"] as const;

export function emptyRecord(imageUrl = ""): CanonicalRecord {
  return {
    progress: 0,
    layer: 0,
    totalLayers: 0,
    elapsed: 0,
    remaining: 0,
    nozzleTemp: 0,
    bedTemp: 0,
    usedFilament: 0,
    filename: "",
    imageUrl,
  };
}

/**
 * Builds a canonical record from one raw frame. Missing or unconvertible
 * fields keep the previous record's value (or the zero value), numeric fields
 * are clamped into range, and the function never throws.
 */
export function sanitize(
  raw: RawFrame,
  previous: CanonicalRecord | null,
  options: SanitizeOptions = {}
): CanonicalRecord {
  const base = previous ?? emptyRecord();

  const pickNumber = (field: NumericField): number => {
    const rule = NUMERIC_RULES[field];
    const found = pickRaw(raw, rule.keys);
    if (!found) return base[field];
    const converted = rule.integer ? asInteger(found.value) : asNumber(found.value);
    if (converted === undefined) {
      options.onInvalidField?.(new FieldValidationError(found.key, found.value));
      return base[field];
    }
    return clamp(converted, rule.min, rule.max);
  };

  const layer = pickNumber("layer");
  const totalLayers = Math.max(layer, pickNumber("totalLayers"));

  return {
    progress: pickNumber("progress"),
    layer,
    totalLayers,
    elapsed: pickNumber("elapsed"),
    remaining: pickNumber("remaining"),
    nozzleTemp: pickNumber("nozzleTemp"),
    bedTemp: pickNumber("bedTemp"),
    usedFilament: pickNumber("usedFilament"),
    filename: pickFilename(raw, base.filename, options),
    imageUrl: options.imageUrl ?? base.imageUrl,
  };
}

function pickFilename(raw: RawFrame, fallback: string, options: SanitizeOptions): string {
  const found = pickRaw(raw, FILENAME_KEYS);
  if (!found) return fallback;
  const value = asString(found.value);
  if (value === undefined) {
    options.onInvalidField?.(new FieldValidationError(found.key, found.value));
    return fallback;
  }
  return baseName(value.trim());
}

function pickRaw(raw: RawFrame, keys: readonly string[]): { key: string; value: unknown } | undefined {
  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(raw, key) && raw[key] !== undefined) {
      return { key, value: raw[key] };
    }
  }
  return undefined;
}
