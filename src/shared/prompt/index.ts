/**
 * Interactive prompts - barrel exports
 */

export {
  type SelectOptionItem,
  type KeyInputResult,
  renderMenu,
  countRenderedLines,
  handleKeyInput,
  selectOption,
  selectMany,
} from './select.js';

export { promptInput, promptMultiline, readMultilineFromStream, confirm } from './confirm.js';

export { type Prompter, type PromptRequest, type PromptHandler, PromptBroker } from './broker.js';

export { terminalPrompter, answerOnTerminal } from './terminal.js';
