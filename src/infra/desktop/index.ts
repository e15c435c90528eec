export type { LauncherOptions } from './launcher.js';
export { buildDesktopEntry, currentExecCommand, quoteExecArg, writeDesktopLauncher } from './launcher.js';
