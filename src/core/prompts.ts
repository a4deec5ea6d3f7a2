import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

export type PromptName = 'plan_composer' | 'slot_extractor';

const memo = new Map<PromptName, string>();

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

export async function getPrompt(name: PromptName): Promise<string> {
  const cached = memo.get(name);
  if (cached !== undefined) return cached;
  const text = await readFile(path.join(promptsDir(), `${name}.md`), 'utf-8');
  memo.set(name, text);
  return text;
}

/** Replaces `{{key}}` placeholders; unknown keys are left as they are. */
export function renderPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

export async function preloadPrompts(): Promise<void> {
  await Promise.all((['plan_composer', 'slot_extractor'] as const).map((name) => getPrompt(name)));
}
