import fs from 'fs-extra';
import path from 'node:path';
import type { StoryPrompt } from '../models.js';

const PROMPT_DIR = 'prompts';
const CORPUS_DIR = 'corpus';
export const CUSTOM_CATEGORY = 'custom';

function listTextFiles(dir: string): string[] {
  if (!fs.pathExistsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.txt'))
    .sort()
    .map((name) => path.join(dir, name));
}

export function parsePromptFile(category: string, name: string, text: string): StoryPrompt {
  const normalized = text.replace(/\r\n?/g, '\n');
  const newline = normalized.indexOf('\n');
  const context = newline === -1 ? normalized : normalized.slice(0, newline);
  const prompt = newline === -1 ? '' : normalized.slice(newline + 1);
  return { category, name, context: context.trim(), prompt: prompt.trim() };
}

export const loadPrompts = (contentRoot: string): StoryPrompt[] => {
  const root = path.join(contentRoot, PROMPT_DIR);
  if (!fs.pathExistsSync(root)) return [];

  const prompts: StoryPrompt[] = [];
  for (const category of fs.readdirSync(root).sort()) {
    const dir = path.join(root, category);
    if (!fs.statSync(dir).isDirectory()) continue;
    for (const file of listTextFiles(dir)) {
      const name = path.basename(file, '.txt');
      prompts.push(parsePromptFile(category, name, fs.readFileSync(file, 'utf8')));
    }
  }
  return prompts;
};

export const loadInstructions = (contentRoot: string): string => {
  const p = path.join(contentRoot, 'interface', 'instructions.txt');
  return fs.pathExistsSync(p) ? fs.readFileSync(p, 'utf8') : '';
};

/** Corpus documents plus every prompt, so the local model knows the words a story starts with. */
export const loadCorpus = (contentRoot: string): string[] => {
  const documents = listTextFiles(path.join(contentRoot, CORPUS_DIR)).flatMap((file) =>
    fs
      .readFileSync(file, 'utf8')
      .split(/\n\s*\n/)
      .map((paragraph) => paragraph.trim())
      .filter(Boolean)
  );
  for (const prompt of loadPrompts(contentRoot)) {
    documents.push(`${prompt.context}\n${prompt.prompt}`.trim());
  }
  return documents;
};

export function sanitizePromptName(name: string): string {
  return name
    .replace(/[^a-zA-Z0-9_-]+/g, '-')
    .replace(/^-+/, '')
    .replace(/-+$/, '');
}

/** Saves a custom prompt and returns its path, or null when the name has nothing usable in it. */
export const savePrompt = (contentRoot: string, name: string, context: string, prompt: string): string | null => {
  const safeName = sanitizePromptName(name);
  if (!safeName) return null;
  const p = path.join(contentRoot, PROMPT_DIR, CUSTOM_CATEGORY, `${safeName}.txt`);
  fs.outputFileSync(p, `${context}\n${prompt}\n`);
  return p;
};
