import fs from "fs-extra";
import { CONFIG_FILE, DEFAULT_FEATURES, DEFAULT_NAMESPACE, DEFAULT_STATE_FILE } from "../constants.ts";
import { ConfigError, errorMessage } from "../errors.ts";
import { Logger } from "../logger.ts";
import type { CompilerFeatures } from "../types/workload-types.ts";

export interface CompilerConfig {
  defaultNamespace: string;
  stateFile: string;
  features: CompilerFeatures;
}

interface CompilerConfigFile {
  defaultNamespace?: string;
  stateFile?: string;
  features?: Partial<CompilerFeatures>;
}

function defaultConfig(): CompilerConfig {
  return {
    defaultNamespace: DEFAULT_NAMESPACE,
    stateFile: DEFAULT_STATE_FILE,
    features: { ...DEFAULT_FEATURES },
  };
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: CompilerConfig;

  private constructor() {
    this.config = defaultConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Loads the config file, merging it over the defaults. A missing file
   * leaves the defaults in place.
   */
  async load(filePath: string = CONFIG_FILE): Promise<CompilerConfig> {
    this.config = defaultConfig();

    if (!(await fs.pathExists(filePath))) {
      Logger.debug(`No config file at ${filePath}, using defaults`);
      return this.get();
    }

    let loadedConfig: unknown;
    try {
      loadedConfig = await fs.readJson(filePath);
    } catch (err) {
      throw new ConfigError(`Failed to load config ${filePath}: ${errorMessage(err)}`, { filePath }, { cause: err });
    }

    if (!this.validateConfig(loadedConfig)) {
      throw new ConfigError(`Invalid config file structure: ${filePath}`, { filePath });
    }

    this.config = {
      defaultNamespace: loadedConfig.defaultNamespace ?? this.config.defaultNamespace,
      stateFile: loadedConfig.stateFile ?? this.config.stateFile,
      features: { ...this.config.features, ...loadedConfig.features },
    };
    Logger.debug(`Loaded config from ${filePath}`);
    return this.get();
  }

  private validateConfig(config: unknown): config is CompilerConfigFile {
    if (!config || typeof config !== "object") return false;

    const { defaultNamespace, stateFile, features } = config as CompilerConfigFile;

    if (defaultNamespace !== undefined && typeof defaultNamespace !== "string") return false;
    if (stateFile !== undefined && typeof stateFile !== "string") return false;

    if (features !== undefined) {
      if (typeof features !== "object" || !features) return false;
      const { hardenContainers, binaryContent } = features;
      if (hardenContainers !== undefined && typeof hardenContainers !== "boolean") return false;
      if (binaryContent !== undefined && typeof binaryContent !== "boolean") return false;
    }

    return true;
  }

  get(): CompilerConfig {
    return { ...this.config, features: { ...this.config.features } };
  }

  getFeatures(): CompilerFeatures {
    return { ...this.config.features };
  }

  getDefaultNamespace(): string {
    return this.config.defaultNamespace;
  }

  getStateFile(): string {
    return this.config.stateFile;
  }
}
