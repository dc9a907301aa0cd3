export type RawFrame = Record<string, unknown>;

export type CanonicalRecord = {
  progress: number;
  layer: number;
  totalLayers: number;
  elapsed: number;
  remaining: number;
  nozzleTemp: number;
  bedTemp: number;
  usedFilament: number;
  filename: string;
  imageUrl: string;
};

export type NumericField = {
  [K in keyof CanonicalRecord]: CanonicalRecord[K] extends number ? K : never;
}[keyof CanonicalRecord];

export type StringField = Exclude<keyof CanonicalRecord, NumericField>;

export const NUMERIC_FIELDS: readonly NumericField[] = [
  "progress",
  "layer",
  "totalLayers",
  "elapsed",
  "remaining",
  "nozzleTemp",
  "bedTemp",
  "usedFilament",
];

export const STRING_FIELDS: readonly StringField[] = ["filename", "imageUrl"];

/** Wire document published downstream, one per accepted record. */
export type PublishPayload = {
  progress: number;
  layer: number;
  total_layers: number;
  elapsed: number;
  remaining: number;
  filename: string;
  nozzle_temp: number;
  bed_temp: number;
  used_filament: number;
  image_url: string;
};

export function toPayload(record: CanonicalRecord): PublishPayload {
  return {
    progress: record.progress,
    layer: record.layer,
    total_layers: record.totalLayers,
    elapsed: record.elapsed,
    remaining: record.remaining,
    filename: record.filename,
    nozzle_temp: record.nozzleTemp,
    bed_temp: record.bedTemp,
    used_filament: record.usedFilament,
    image_url: record.imageUrl,
  };
}

export type SessionPhase = "disconnected" | "connecting" | "connected" | "backoff" | "stopped";

export type SessionCounters = {
  frames_in: number;
  frames_bad: number;
  published: number;
  refreshes: number;
  publish_failed: number;
  snapshots_ok: number;
  snapshots_failed: number;
};

export type SessionState = {
  phase: SessionPhase;
  lastRecord: CanonicalRecord | null;
  lastPublished: CanonicalRecord | null;
  lastDeliveryAt: number;
  lastSnapshotAt: number;
  snapshotInFlight: boolean;
  currentJob: string | null;
  consecutiveFailures: number;
  backoffMs: number;
  counters: SessionCounters;
};
