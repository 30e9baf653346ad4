import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

/** `levels/by_date` -> `levels_by_date.ndjson` */
export function ndjsonPath(outdir: string, name: string): string {
  return join(outdir, name.replace(/[\\/]/g, "_") + ".ndjson");
}

export function emitNDJSON(outdir: string, name: string, rows: unknown[]): string {
  ensureDir(outdir);
  const path = ndjsonPath(outdir, name);
  writeFileSync(path, rows.map((r) => JSON.stringify(r)).join("\n"));
  return path;
}

export function readNDJSON(p: string): unknown[] {
  if (!existsSync(p)) return [];
  const txt = readFileSync(p, "utf8").trim();
  if (!txt) return [];
  return txt.split("\n").map((line): unknown => JSON.parse(line));
}
