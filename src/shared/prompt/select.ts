/**
 * Arrow-key menus: single choice for the tab menus and pickers,
 * checkboxes for the changed-file list.
 */

import chalk from 'chalk';
import { EXIT_SIGINT } from '../exitCodes.js';
import { truncateText } from '../utils/index.js';

/** Option type for selectOption */
export interface SelectOptionItem<T extends string> {
  label: string;
  value: T;
  description?: string;
}

/**
 * Render the menu options to the terminal.
 * `checked` switches to checkbox rendering for multiple selection.
 * Exported for testing.
 */
export function renderMenu<T extends string>(
  options: SelectOptionItem<T>[],
  selectedIndex: number,
  hasCancelOption: boolean,
  cancelLabel = 'Cancel',
  checked?: ReadonlySet<number>,
): string[] {
  const maxWidth = process.stdout.columns || 80;
  const checkboxWidth = checked ? 4 : 0;
  const labelPrefix = 4 + checkboxWidth;
  const descPrefix = 5 + checkboxWidth;

  const lines: string[] = [];

  options.forEach((opt, i) => {
    const isSelected = i === selectedIndex;
    const cursor = isSelected ? chalk.cyan('❯') : ' ';
    const box = checked ? (checked.has(i) ? chalk.green('[x] ') : '[ ] ') : '';
    const truncatedLabel = truncateText(opt.label, maxWidth - labelPrefix);
    const label = isSelected ? chalk.cyan.bold(truncatedLabel) : truncatedLabel;
    lines.push(`  ${cursor} ${box}${label}`);

    if (opt.description) {
      const truncatedDesc = truncateText(opt.description, maxWidth - descPrefix);
      lines.push(chalk.gray(`     ${' '.repeat(checkboxWidth)}${truncatedDesc}`));
    }
  });

  if (hasCancelOption) {
    const isCancelSelected = selectedIndex === options.length;
    const cursor = isCancelSelected ? chalk.cyan('❯') : ' ';
    const label = isCancelSelected ? chalk.cyan.bold(cancelLabel) : chalk.gray(cancelLabel);
    lines.push(`  ${cursor} ${label}`);
  }

  return lines;
}

/** Lines `renderMenu` produces for these options */
export function countRenderedLines<T extends string>(
  options: SelectOptionItem<T>[],
  hasCancelOption: boolean,
): number {
  let count = 0;
  for (const opt of options) {
    count++;
    if (opt.description) count++;
  }
  if (hasCancelOption) count++;
  return count;
}

/** Result of handling a key input */
export type KeyInputResult =
  | { action: 'move'; newIndex: number }
  | { action: 'confirm'; selectedIndex: number }
  | { action: 'cancel'; cancelIndex: number }
  | { action: 'toggle'; selectedIndex: number }
  | { action: 'exit' }
  | { action: 'none' };

/**
 * Pure function for key input state transitions.
 * Exported for testing.
 */
export function handleKeyInput(
  key: string,
  currentIndex: number,
  totalItems: number,
  hasCancelOption: boolean,
  optionCount: number,
): KeyInputResult {
  if (key === '\x1B[A' || key === 'k') {
    return { action: 'move', newIndex: (currentIndex - 1 + totalItems) % totalItems };
  }
  if (key === '\x1B[B' || key === 'j') {
    return { action: 'move', newIndex: (currentIndex + 1) % totalItems };
  }
  if (key === '\r' || key === '\n') {
    return { action: 'confirm', selectedIndex: currentIndex };
  }
  if (key === '\x03') {
    return { action: 'exit' };
  }
  if (key === '\x1B') {
    return { action: 'cancel', cancelIndex: hasCancelOption ? optionCount : -1 };
  }
  if (key === ' ') {
    return { action: 'toggle', selectedIndex: currentIndex };
  }
  return { action: 'none' };
}

const MENU_HINTS = {
  single: '  (↑↓ to move, Enter to select, Esc to go back)',
  multiple: '  (↑↓ to move, Space to toggle, Enter to confirm)',
} as const;

interface MenuSettings {
  cancelLabel: string;
  /** Space toggles entries; Enter confirms the checked set */
  multiple: boolean;
}

/** Outcome of one menu run: the confirmed index, or null when cancelled */
interface MenuResult {
  index: number | null;
  checked: ReadonlySet<number>;
}

/**
 * One menu on screen. Tracks the cursor and the checked set and redraws
 * itself in place after every key.
 */
class MenuSession<T extends string> {
  private index = 0;
  private drawnLines = 0;
  private readonly checked: Set<number> | undefined;

  constructor(
    private readonly message: string,
    private readonly options: SelectOptionItem<T>[],
    private readonly settings: MenuSettings,
  ) {
    this.checked = settings.multiple ? new Set<number>() : undefined;
  }

  run(): Promise<MenuResult> {
    process.stdout.write(`\n${chalk.cyan(this.message)}\n`);
    process.stdout.write(`${chalk.gray(this.settings.multiple ? MENU_HINTS.multiple : MENU_HINTS.single)}\n\n`);
    process.stdout.write('\x1B[?7l');
    this.draw();

    if (!process.stdin.isTTY) {
      process.stdout.write('\x1B[?7h');
      return Promise.resolve({ index: null, checked: new Set() });
    }

    return new Promise((resolve) => {
      const wasRaw = process.stdin.isRaw;
      const finish = (result: MenuResult): void => {
        process.stdin.removeListener('data', onData);
        process.stdin.setRawMode(wasRaw ?? false);
        process.stdin.pause();
        process.stdout.write('\x1B[?7h');
        resolve(result);
      };
      const onData = (data: Buffer): void => {
        const result = this.handle(data.toString());
        if (result === 'exit') {
          finish({ index: null, checked: new Set() });
          process.exit(EXIT_SIGINT);
        }
        if (result) {
          finish(result);
        }
      };

      process.stdin.setRawMode(true);
      process.stdin.resume();
      process.stdin.on('data', onData);
    });
  }

  /** Apply one key; returns the final result once the menu closes */
  private handle(key: string): MenuResult | 'exit' | undefined {
    const optionCount = this.options.length;
    const result = handleKeyInput(key, this.index, optionCount + 1, true, optionCount);
    switch (result.action) {
      case 'move':
        this.index = result.newIndex;
        this.draw();
        return undefined;
      case 'toggle':
        if (this.checked && result.selectedIndex < optionCount) {
          if (!this.checked.delete(result.selectedIndex)) {
            this.checked.add(result.selectedIndex);
          }
          this.draw();
        }
        return undefined;
      case 'confirm':
        return result.selectedIndex < optionCount
          ? { index: result.selectedIndex, checked: this.checked ?? new Set() }
          : { index: null, checked: new Set() };
      case 'cancel':
        return { index: null, checked: new Set() };
      case 'exit':
        return 'exit';
      case 'none':
        return undefined;
    }
  }

  private draw(): void {
    if (this.drawnLines > 0) {
      process.stdout.write(`\x1B[${this.drawnLines}A\x1B[J`);
    }
    const lines = renderMenu(this.options, this.index, true, this.settings.cancelLabel, this.checked);
    process.stdout.write(lines.join('\n') + '\n');
    this.drawnLines = lines.length;
  }
}

/**
 * Prompt user to select from a list of options using cursor navigation.
 * @returns Selected option or null if cancelled
 */
export async function selectOption<T extends string>(
  message: string,
  options: SelectOptionItem<T>[],
  cancelLabel = 'Cancel',
): Promise<T | null> {
  if (options.length === 0) return null;

  const { index } = await new MenuSession(message, options, { cancelLabel, multiple: false }).run();
  const selected = index === null ? undefined : options[index];
  if (!selected) {
    return null;
  }
  process.stdout.write(`${chalk.green(`  ✓ ${selected.label}`)}\n`);
  return selected.value;
}

/**
 * Checkbox selection. Enter on an entry with nothing checked selects that entry alone.
 * @returns Checked values in menu order, or null if cancelled
 */
export async function selectMany<T extends string>(
  message: string,
  options: SelectOptionItem<T>[],
): Promise<T[] | null> {
  if (options.length === 0) return null;

  const { index, checked } = await new MenuSession(message, options, { cancelLabel: 'Cancel', multiple: true }).run();
  if (index === null) {
    return null;
  }

  const indices = checked.size > 0 ? [...checked].sort((a, b) => a - b) : [index];
  const values = indices.flatMap((i) => {
    const option = options[i];
    return option ? [option.value] : [];
  });
  process.stdout.write(`${chalk.green(`  ✓ ${values.length} selected`)}\n`);
  return values;
}
