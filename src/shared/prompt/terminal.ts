/**
 * Prompter backed by the terminal prompts
 */

import type { Prompter, PromptRequest } from './broker.js';
import { confirm, promptInput, promptMultiline } from './confirm.js';
import { selectOption } from './select.js';

export const terminalPrompter: Prompter = {
  input: promptInput,
  multiline: promptMultiline,
  confirm,
  select: selectOption,
};

/** Answer a brokered request on the terminal */
export async function answerOnTerminal(request: PromptRequest): Promise<void> {
  switch (request.kind) {
    case 'input':
      request.resolve(await promptInput(request.message, request.defaultValue));
      break;
    case 'multiline':
      request.resolve(await promptMultiline(request.message));
      break;
    case 'confirm':
      request.resolve(await confirm(request.message, request.defaultYes));
      break;
    case 'select':
      request.resolve(await selectOption(request.message, request.options));
      break;
  }
}
