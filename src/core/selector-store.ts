/**
 * @fileoverview Persistence for pod selector identifiers.
 *
 * A selector identifier is generated once per workload and reused on every
 * later compile. Regenerating it would change the pod selector and replace
 * every pod, so callers always go through {@link resolveSelectorId}.
 *
 * @module SelectorStore
 * @since 1.0.0
 */

import { randomBytes } from "node:crypto";
import fs from "fs-extra";
import { SELECTOR_ID_BYTES } from "../constants.ts";
import { StateStoreError, errorMessage } from "../errors.ts";
import { Logger } from "../logger.ts";

export interface SelectorStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, selectorId: string): Promise<void>;
}

interface SelectorState {
  selectors: Record<string, string>;
}

/** Key under which a workload's selector identifier is stored. */
export function selectorKey(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

/** 8 random bytes as 16 lowercase hex characters. */
export function generateSelectorId(): string {
  return randomBytes(SELECTOR_ID_BYTES).toString("hex");
}

/**
 * Returns the stored identifier for `key`, generating and storing one when
 * none exists yet.
 */
export async function resolveSelectorId(
  store: SelectorStore,
  key: string,
  generate: () => string = generateSelectorId,
): Promise<string> {
  const existing = await store.get(key);
  if (existing !== undefined) {
    Logger.debug(`Reusing selector id for ${key}`);
    return existing;
  }

  const selectorId = generate();
  await store.set(key, selectorId);
  Logger.info(`Generated selector id for ${key}`);
  return selectorId;
}

export class InMemorySelectorStore implements SelectorStore {
  private readonly selectors = new Map<string, string>();

  get(key: string): Promise<string | undefined> {
    return Promise.resolve(this.selectors.get(key));
  }

  set(key: string, selectorId: string): Promise<void> {
    this.selectors.set(key, selectorId);
    return Promise.resolve();
  }
}

/**
 * Stores identifiers in a JSON file of the form `{ "selectors": { "<ns>/<name>": "<id>" } }`.
 *
 * A missing file is an empty store; the file and its directory are created
 * on the first write.
 */
export class FileSelectorStore implements SelectorStore {
  private state: SelectorState | undefined;

  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<string | undefined> {
    const state = await this.load();
    return state.selectors[key];
  }

  async set(key: string, selectorId: string): Promise<void> {
    const state = await this.load();
    state.selectors[key] = selectorId;
    try {
      await fs.outputJson(this.filePath, state, { spaces: 2 });
    } catch (err) {
      throw new StateStoreError(
        `Failed to write state file ${this.filePath}: ${errorMessage(err)}`,
        { filePath: this.filePath },
        { cause: err },
      );
    }
  }

  private async load(): Promise<SelectorState> {
    if (this.state) {
      return this.state;
    }

    if (!(await fs.pathExists(this.filePath))) {
      this.state = { selectors: {} };
      return this.state;
    }

    let content: unknown;
    try {
      content = await fs.readJson(this.filePath);
    } catch (err) {
      throw new StateStoreError(
        `Failed to read state file ${this.filePath}: ${errorMessage(err)}`,
        { filePath: this.filePath },
        { cause: err },
      );
    }

    if (!this.validateState(content)) {
      throw new StateStoreError(`Invalid state file structure: ${this.filePath}`, { filePath: this.filePath });
    }

    this.state = { selectors: { ...content.selectors } };
    return this.state;
  }

  private validateState(state: unknown): state is SelectorState {
    if (!state || typeof state !== "object") return false;

    const { selectors } = state as SelectorState;
    if (typeof selectors !== "object" || !selectors) return false;
    for (const value of Object.values(selectors)) {
      if (typeof value !== "string") return false;
    }

    return true;
  }
}
