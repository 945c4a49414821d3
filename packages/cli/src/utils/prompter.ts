/**
 * Prompter backed by inquirer
 */

import inquirer from 'inquirer';
import type { Prompter } from '@git-onboard/core';

export class InquirerPrompter implements Prompter {
  async ask(message: string, defaultValue?: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: 'input',
        name: 'answer',
        message,
        default: defaultValue,
      },
    ]);
    return answer;
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const { answer } = await inquirer.prompt<{ answer: boolean }>([
      {
        type: 'confirm',
        name: 'answer',
        message,
        default: defaultValue,
      },
    ]);
    return answer;
  }
}
