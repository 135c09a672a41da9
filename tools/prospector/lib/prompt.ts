import { readFileSync } from "fs";
import { join } from "path";
import { PROMPTS_DIR } from "./paths.js";
import { emitAgentEvent } from "../pipeline/events.js";

export type PromptValues = Record<string, string>;

const promptCache = new Map<string, string>();

export function loadPrompt(name: string, dir: string = PROMPTS_DIR): string {
  const path = join(dir, `${name}.md`);
  const cached = promptCache.get(path);
  if (cached !== undefined) {
    return cached;
  }
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Loading prompt file",
    path,
  });
  const template = readFileSync(path, "utf-8");
  promptCache.set(path, template);
  return template;
}

/**
 * Substitutes `{name}` placeholders. Placeholders without a value are left
 * in place, and `{{` / `}}` render as literal braces so templates can show
 * JSON examples.
 */
export function renderPrompt(template: string, values: PromptValues): string {
  return template.replace(/\{\{|\}\}|\{([a-z_][a-z0-9_]*)\}/gi, (match, key: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (key !== undefined && Object.prototype.hasOwnProperty.call(values, key)) {
      return values[key];
    }
    return match;
  });
}
