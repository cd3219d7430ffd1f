import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const PROMPTS_DIR = process.env.TUTORIAL_PROMPTS_DIR || fileURLToPath(new URL('../prompts/', import.meta.url));

const cache = new Map<string, string>();

export function loadPrompt(name: string): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const text = readFileSync(join(PROMPTS_DIR, name), 'utf-8').trim();
  cache.set(name, text);
  return text;
}

/** Replaces `{{key}}` placeholders; unknown keys are left untouched. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
