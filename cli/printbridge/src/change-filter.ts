import { CanonicalRecord, NUMERIC_FIELDS, NumericField, STRING_FIELDS } from "./schema.js";

export type ToleranceClass = "progress" | "layers" | "time" | "temperature" | "filament";

export type Tolerances = Record<ToleranceClass, number>;

export const DEFAULT_TOLERANCES: Tolerances = {
  progress: 0.5,
  layers: 0,
  time: 1,
  temperature: 0.5,
  filament: 1,
};

const FIELD_CLASS: Record<NumericField, ToleranceClass> = {
  progress: "progress",
  layer: "layers",
  totalLayers: "layers",
  elapsed: "time",
  remaining: "time",
  nozzleTemp: "temperature",
  bedTemp: "temperature",
  usedFilament: "filament",
};

export function changedFields(
  candidate: CanonicalRecord,
  lastPublished: CanonicalRecord,
  tolerances: Tolerances = DEFAULT_TOLERANCES
): string[] {
  const changed: string[] = [];
  for (const field of NUMERIC_FIELDS) {
    const tolerance = tolerances[FIELD_CLASS[field]];
    if (Math.abs(candidate[field] - lastPublished[field]) > tolerance) changed.push(field);
  }
  for (const field of STRING_FIELDS) {
    if (candidate[field] !== lastPublished[field]) changed.push(field);
  }
  return changed;
}

export function shouldPublish(
  candidate: CanonicalRecord,
  lastPublished: CanonicalRecord | null,
  tolerances: Tolerances = DEFAULT_TOLERANCES
): boolean {
  if (!lastPublished) return true;
  return changedFields(candidate, lastPublished, tolerances).length > 0;
}

/** Holds the last published record and debounces candidates against it. */
export class ChangeFilter {
  private lastPublished: CanonicalRecord | null = null;

  constructor(private tolerances: Tolerances = DEFAULT_TOLERANCES) {}

  offer(candidate: CanonicalRecord): boolean {
    if (!shouldPublish(candidate, this.lastPublished, this.tolerances)) return false;
    this.lastPublished = { ...candidate };
    return true;
  }

  /** Records a candidate as published without consulting the tolerances. */
  force(candidate: CanonicalRecord) {
    this.lastPublished = { ...candidate };
  }

  getLastPublished(): CanonicalRecord | null {
    return this.lastPublished ? { ...this.lastPublished } : null;
  }

  reset() {
    this.lastPublished = null;
  }
}
