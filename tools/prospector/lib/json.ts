import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitAgentEvent } from "../pipeline/events.js";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readJsonFile(path: string): unknown {
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading JSON file",
    path,
  });
  return JSON.parse(readFileSync(path, "utf-8"));
}

export function writeJsonAtomic(path: string, value: unknown): void {
  writeTextAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

export function writeTextAtomic(path: string, content: string): void {
  ensureDir(dirname(path));
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing text file atomically",
    path,
    bytes: content.length,
  });
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  writeFileSync(tmpPath, content);
  renameSync(tmpPath, path);
}
