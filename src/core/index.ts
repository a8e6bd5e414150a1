/**
 * @fileoverview Core modules: compiler configuration and selector id persistence.
 */

export { ConfigManager } from './config-manager.ts';
export type { CompilerConfig } from './config-manager.ts';
export {
  FileSelectorStore,
  InMemorySelectorStore,
  generateSelectorId,
  resolveSelectorId,
  selectorKey,
} from './selector-store.ts';
export type { SelectorStore } from './selector-store.ts';
