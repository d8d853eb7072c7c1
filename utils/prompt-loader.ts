/**
 * Load prompt templates from the prompts/ directory.
 * Resolved from import.meta.url so it works both from sources and from dist/.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));
// utils/ -> prompts/ when run from sources, dist/utils/ -> prompts/ when built.
const PROMPT_DIR_CANDIDATES = [join(__dirname, "..", "prompts"), join(__dirname, "..", "..", "prompts")];

const templates = new Map<string, string>();

/** Reads `prompts/<name>.txt` once and keeps it for the life of the process. */
export function loadPrompt(name: string): string {
  const known = templates.get(name);
  if (known !== undefined) return known;
  const dir = PROMPT_DIR_CANDIDATES.find((candidate) => existsSync(candidate));
  if (!dir) throw new Error(`prompts directory not found (looked in ${PROMPT_DIR_CANDIDATES.join(", ")})`);
  const template = readFileSync(join(dir, `${name}.txt`), "utf-8");
  templates.set(name, template);
  return template;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/** Substitutes `{{name}}` placeholders in one pass; names missing from `vars` stay as written. */
export function fillPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder: string, name: string) =>
    Object.hasOwn(vars, name) ? vars[name] : placeholder,
  );
}
