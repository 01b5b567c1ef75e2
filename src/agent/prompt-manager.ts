import * as fs from 'fs';
import * as path from 'path';
import { PromptBundle } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DEFAULT_PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

const FALLBACK_PROMPTS: PromptBundle = {
  system: 'You are Copilot, a friendly assistant for a sales and marketing team. Reply in the language the user writes in.',
  greeting: 'Greet the user warmly and offer help with CRM contacts, lead scores and marketing campaigns.',
  domainQuery: 'Answer using only the record-system data provided. Never invent values that are not in the data.',
};

const PROMPT_FILES: Record<keyof PromptBundle, string> = {
  system: 'system.md',
  greeting: 'greeting.md',
  domainQuery: 'domain-query.md',
};

/**
 * Loads prompt text from markdown files in prompts/.
 * A missing or empty file falls back to a built-in prompt.
 */
export class PromptManager {
  private bundle: PromptBundle = { ...FALLBACK_PROMPTS };

  constructor(private readonly promptsDir: string = DEFAULT_PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    const loaded: string[] = [];
    for (const key of ['system', 'greeting', 'domainQuery'] as const) {
      const text = this.readPromptFile(PROMPT_FILES[key]);
      this.bundle[key] = text ?? FALLBACK_PROMPTS[key];
      if (text) loaded.push(key);
    }
    logger.info({ dir: this.promptsDir, loaded }, 'Prompts loaded');
  }

  get(): PromptBundle {
    return this.bundle;
  }

  private readPromptFile(filename: string): string | undefined {
    const filepath = path.join(this.promptsDir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Prompt file not found; using built-in prompt');
      return undefined;
    }
    try {
      const text = fs.readFileSync(filepath, 'utf-8').trim();
      return text || undefined;
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to read prompt file');
      return undefined;
    }
  }
}
