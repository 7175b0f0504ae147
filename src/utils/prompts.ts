import prompts from 'prompts';
import { UserCancellationError } from './errors.js';

/**
 * Common prompt types and utilities for user interaction
 */

/**
 * Safe wrapper around prompts() that ensures consistent cancellation handling
 * Use this instead of direct prompts() calls to ensure proper error handling
 */
export async function safePrompts(
  questions: prompts.PromptObject | prompts.PromptObject[],
  options?: prompts.Options
): Promise<prompts.Answers<string>> {
  const response = await prompts(questions, {
    onCancel: () => {
      throw new UserCancellationError('Operation cancelled by user');
    },
    ...(options || {})
  });

  if (isCancelled(response)) {
    throw new UserCancellationError('Operation cancelled by user');
  }

  return response;
}

/**
 * Prompt for simple confirmation
 */
export async function promptConfirmation(message: string, initial: boolean = false): Promise<boolean> {
  const response = await safePrompts({
    type: 'confirm',
    name: 'confirmed',
    message,
    initial
  });

  const confirmed: unknown = response.confirmed;
  return confirmed === true;
}

/**
 * Prompt for free text; an empty answer is returned as ''
 */
export async function promptText(message: string): Promise<string> {
  const response = await safePrompts({
    type: 'text',
    name: 'value',
    message
  });

  const value: unknown = response.value;
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Prompt user to select the ecosystem of the current project
 */
export async function promptEcosystemSelection(
  choices: Array<{ id: string; name: string }>
): Promise<string> {
  const response = await safePrompts({
    type: 'select',
    name: 'ecosystem',
    message: 'Which kind of project is this?',
    choices: choices.map(choice => ({ title: choice.name, value: choice.id })),
    hint: 'Use arrow keys to navigate, Enter to select'
  });

  const selected: unknown = response.ecosystem;
  if (typeof selected !== 'string') {
    throw new UserCancellationError('No project type selected');
  }
  return selected;
}

/**
 * Handle cancellation result from prompts
 */
export function isCancelled(result: unknown): boolean {
  return result === undefined;
}
