import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

export const PROSPECTOR_ROOT = resolve(THIS_DIR, "..");
export const PROMPTS_DIR = join(PROSPECTOR_ROOT, "prompts");

export function defaultWorkDir(): string {
  return resolve(process.cwd(), ".tmp", "prospector-runs");
}

export function runDir(workDir: string, runId: string): string {
  return join(workDir, runId);
}
