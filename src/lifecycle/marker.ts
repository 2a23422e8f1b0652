import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage, isErrnoException } from "../errors.js";
import { ActiveRunMarkerSchema, type ActiveRunMarker } from "../schemas.js";
import { log } from "../utils/logger.js";

/**
 * Read the active-run marker. A missing file is null; an unreadable or
 * malformed one is logged and treated as absent.
 */
export async function readMarker(markerPath: string): Promise<ActiveRunMarker | null> {
  let raw: string;
  try {
    raw = await readFile(markerPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn(`Ignoring corrupt run marker ${markerPath}`, { error: errorMessage(err) });
    return null;
  }
  const result = ActiveRunMarkerSchema.safeParse(parsed);
  if (!result.success) {
    log.warn(`Ignoring malformed run marker ${markerPath}`);
    return null;
  }
  return result.data;
}

export async function writeMarker(markerPath: string, marker: ActiveRunMarker): Promise<void> {
  await mkdir(dirname(markerPath), { recursive: true });
  const tmp = `${markerPath}.tmp-${process.pid}`;
  await writeFile(tmp, `${JSON.stringify(marker, null, 2)}\n`, "utf-8");
  await rename(tmp, markerPath);
}

export async function removeMarker(markerPath: string): Promise<void> {
  await rm(markerPath, { force: true });
}

/** Remove the marker only while it still names `pid`. */
export async function releaseMarker(markerPath: string, pid: number): Promise<boolean> {
  const marker = await readMarker(markerPath);
  if (!marker || marker.pid !== pid) return false;
  await removeMarker(markerPath);
  return true;
}
