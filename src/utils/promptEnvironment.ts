import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import * as nunjucks from 'nunjucks';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const PROMPTS_DIR = path.join(__dirname, '..', 'prompts');

export function createPromptEnvironment(dir: string = PROMPTS_DIR): nunjucks.Environment {
  return new nunjucks.Environment(new nunjucks.FileSystemLoader(dir), { autoescape: false });
}

export function renderPrompt(env: nunjucks.Environment, template: string, context: object): string {
  return env.render(template, context).trim();
}
