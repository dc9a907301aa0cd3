import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { FetchTransportError, SizeExceeded, SnapshotError, UnsupportedContentType } from "./errors.js";
import { errorMessage } from "./util.js";

export const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_IMAGE_CONTENT_TYPES: readonly string[] = ["image/png", "image/jpeg", "image/jpg", "image/webp"];
export const DEFAULT_SNAPSHOT_TIMEOUT_MS = 5000;

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type SnapshotRequest = {
  url: string;
  destinationPath: string;
  maxBytes?: number;
  allowedContentTypes?: readonly string[];
  timeoutMs?: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
};

export type SnapshotResult =
  | { ok: true; bytes: number; contentType: string | null; path: string }
  | { ok: false; error: SnapshotError };

export type SnapshotFetcher = (req: SnapshotRequest) => Promise<SnapshotResult>;

export function mediaType(header: string | null): string | null {
  if (!header) return null;
  const type = header.split(";", 1)[0]?.trim().toLowerCase();
  return type ? type : null;
}

/**
 * Streams an image into memory (never more than maxBytes) and swaps it in
 * over destinationPath with a same-directory temp file and rename. Failures
 * leave the existing file as it was.
 */
export async function fetchSnapshot(req: SnapshotRequest): Promise<SnapshotResult> {
  const maxBytes = req.maxBytes ?? DEFAULT_MAX_IMAGE_BYTES;
  const allowed = new Set((req.allowedContentTypes ?? DEFAULT_IMAGE_CONTENT_TYPES).map((t) => t.toLowerCase()));
  const fetchImpl = req.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new FetchTransportError("snapshot request timed out")),
    req.timeoutMs ?? DEFAULT_SNAPSHOT_TIMEOUT_MS
  );
  const onAbort = () => controller.abort(req.signal?.reason);
  if (req.signal?.aborted) onAbort();
  else req.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    let res: Response;
    try {
      res = await fetchImpl(req.url, {
        method: "GET",
        headers: { Accept: "image/*" },
        signal: controller.signal,
      });
    } catch (err: unknown) {
      return fail(new FetchTransportError(`snapshot request failed: ${errorMessage(err)}`, { cause: err }));
    }

    if (!res.ok) {
      await discard(res);
      return fail(new FetchTransportError(`snapshot request returned HTTP ${res.status}`));
    }

    const contentType = mediaType(res.headers.get("content-type"));
    if (contentType && !allowed.has(contentType)) {
      await discard(res);
      return fail(new UnsupportedContentType(contentType));
    }

    const declared = Number(res.headers.get("content-length"));
    if (res.headers.has("content-length") && Number.isFinite(declared) && declared > maxBytes) {
      await discard(res);
      return fail(new SizeExceeded(maxBytes));
    }

    const body = await readBounded(res, maxBytes);
    if (!body.ok) return body;

    try {
      await replaceAtomically(req.destinationPath, body.data);
    } catch (err: unknown) {
      return fail(new FetchTransportError(`writing snapshot failed: ${errorMessage(err)}`, { cause: err }));
    }
    return { ok: true, bytes: body.data.byteLength, contentType, path: req.destinationPath };
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener("abort", onAbort);
  }
}

async function readBounded(
  res: Response,
  maxBytes: number
): Promise<{ ok: true; data: Buffer } | { ok: false; error: SnapshotError }> {
  if (!res.body) return fail(new FetchTransportError("empty snapshot body"));
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return fail(new SizeExceeded(maxBytes));
      }
      chunks.push(value);
    }
  } catch (err: unknown) {
    return fail(new FetchTransportError(`snapshot body failed: ${errorMessage(err)}`, { cause: err }));
  }
  if (total === 0) return fail(new FetchTransportError("empty snapshot body"));
  return { ok: true, data: Buffer.concat(chunks, total) };
}

export async function replaceAtomically(destinationPath: string, data: Uint8Array): Promise<void> {
  const dir = dirname(destinationPath);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(destinationPath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, destinationPath);
  } catch (err: unknown) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

async function discard(res: Response) {
  await res.body?.cancel().catch(() => undefined);
}

function fail(error: SnapshotError): { ok: false; error: SnapshotError } {
  return { ok: false, error };
}
