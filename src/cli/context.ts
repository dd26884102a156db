import type { Kernel } from '../kernel/kernel.js';
import type { PluginManager } from '../plugins/manager.js';

/** What every command of a CLI run shares. */
export interface CliContext {
  kernel: Kernel;
  plugins: PluginManager;
  /** Project root holding config.yml and the rendered environment */
  root: string;
}
