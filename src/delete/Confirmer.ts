import type { ConfirmationPrompt, Confirmer } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('Confirmer');

/**
 * Answers confirmation prompts from answers collected up front, in order.
 * Once the answers run out every further prompt is declined.
 */
export class PresetConfirmer implements Confirmer {
  private readonly answers: boolean[];
  private readonly asked: ConfirmationPrompt[] = [];

  constructor(answers: boolean[]) {
    this.answers = [...answers];
  }

  async confirm(prompt: ConfirmationPrompt): Promise<boolean> {
    this.asked.push(prompt);
    const answer = this.answers.shift() ?? false;
    log.info('Deletion confirmation', { step: prompt.step, folder: prompt.folder, answer });
    return answer;
  }

  get prompts(): readonly ConfirmationPrompt[] {
    return this.asked;
  }
}
