import { InputError } from '../errors';
import { truncate } from '../util/text';

const MAX_REQUEST_LENGTH = 1000;
const MAX_PROMPT_LENGTH = 4000;

export interface PromptParts {
  userMessage: string;
  platform: NodeJS.Platform | string;
  shell?: string;
  cwd?: string;
  safeMode?: boolean;
}

export interface PromptBuildResult {
  prompt: string;
  summary: {
    request: string;
    platform: string;
    shell?: string;
    cwd?: string;
    safeMode: boolean;
    truncated: boolean;
  };
}

export function buildPrompt(parts: PromptParts): PromptBuildResult {
  const request = parts.userMessage.trim();
  if (!request) {
    throw new InputError('Please enter a command request');
  }
  const sections: string[] = [];
  sections.push('You are a helpful shell command expert. Generate a single shell command.');
  sections.push(`User request: ${truncate(request, MAX_REQUEST_LENGTH)}`);

  const envLines = [`Operating system: ${parts.platform}`];
  if (parts.shell) {
    envLines.push(`Shell: ${parts.shell}`);
  }
  if (parts.cwd) {
    envLines.push(`Working directory: ${truncate(parts.cwd, 200)}`);
  }
  sections.push(envLines.join('\n'));

  if (parts.safeMode) {
    sections.push(
      'Only read-only commands are permitted: no writes, redirections, deletions or command chaining.'
    );
  }
  sections.push('Important: Respond with ONLY the command, no explanations or markdown.');

  const prompt = sections.join('\n');
  return {
    prompt: prompt.length > MAX_PROMPT_LENGTH ? prompt.slice(0, MAX_PROMPT_LENGTH) : prompt,
    summary: {
      request,
      platform: String(parts.platform),
      shell: parts.shell,
      cwd: parts.cwd,
      safeMode: !!parts.safeMode,
      truncated: request.length > MAX_REQUEST_LENGTH,
    },
  };
}
