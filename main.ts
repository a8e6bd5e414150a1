#!/usr/bin/env -S node --import tsx

import { Command } from "commander";
import fs from "fs-extra";
import { ConfigManager } from "./src/core/config-manager.ts";
import { FileSelectorStore, InMemorySelectorStore, generateSelectorId } from "./src/core/selector-store.ts";
import type { SelectorStore } from "./src/core/selector-store.ts";
import { CONFIG_FILE } from "./src/constants.ts";
import { CompilerError, ErrorCodes, errorMessage } from "./src/errors.ts";
import { ManifestGenerator } from "./src/kubernetes/manifest-generator.ts";
import { Logger } from "./src/logger.ts";
import { formatOutputs, promptStarterAnswers, starterWorkloadYaml } from "./src/utils/cli-helpers.ts";
import { loadWorkloadFile } from "./src/workload/workload-loader.ts";

interface GlobalOptions {
  config: string;
  verbose?: boolean;
}

interface CompileOptions {
  output?: string;
  state: boolean;
  outputs?: boolean;
}

const program = new Command();

program
  .name("workload-compiler")
  .description("Compile workload descriptions into Kubernetes manifests")
  .version("1.0.0")
  .option("-c, --config <file>", "compiler config file", CONFIG_FILE)
  .option("-v, --verbose", "print debug output")
  .hook("preAction", () => {
    Logger.setVerbose(program.opts<GlobalOptions>().verbose === true);
  });

async function createGenerator(): Promise<{ generator: ManifestGenerator; stateFile: string }> {
  const config = await ConfigManager.getInstance().load(program.opts<GlobalOptions>().config);
  return {
    generator: new ManifestGenerator({
      defaultNamespace: config.defaultNamespace,
      features: config.features,
    }),
    stateFile: config.stateFile,
  };
}

program
  .command("compile")
  .description("Compile a workload file and print the manifests as YAML")
  .argument("<file>", "workload description (YAML or JSON)")
  .option("-o, --output <file>", "write the manifests to a file instead of stdout")
  .option("--no-state", "do not persist the selector id; generate a fresh one")
  .option("--outputs", "print the output summary to stderr")
  .action(async (file: string, options: CompileOptions) => {
    const { generator, stateFile } = await createGenerator();
    const store: SelectorStore = options.state ? new FileSelectorStore(stateFile) : new InMemorySelectorStore();

    const compiled = await generator.compileWithStore(await loadWorkloadFile(file), store);
    const yaml = generator.manifestsToYaml(compiled.manifests);

    if (options.output) {
      await fs.outputFile(options.output, yaml);
      Logger.success(`Wrote ${compiled.manifests.length} manifests to ${options.output}`);
    } else {
      process.stdout.write(yaml);
    }

    if (options.outputs) {
      console.error(formatOutputs(compiled.outputs));
    }
  });

program
  .command("validate")
  .description("Check that workload files compile")
  .argument("<files...>", "workload descriptions (YAML or JSON)")
  .action(async (files: string[]) => {
    const { generator } = await createGenerator();
    let failures = 0;

    for (const file of files) {
      try {
        generator.compile(await loadWorkloadFile(file), generateSelectorId());
        Logger.success(`${file} is valid`);
      } catch (err) {
        failures++;
        Logger.error(`${file}: ${errorMessage(err)}`);
      }
    }

    if (failures > 0) {
      throw new CompilerError(`${failures} of ${files.length} workload file(s) failed validation`, ErrorCodes.VALIDATION_FAILED);
    }
  });

program
  .command("init")
  .description("Interactively create a starter workload file")
  .argument("[file]", "file to create", "workload.yaml")
  .option("-f, --force", "overwrite an existing file")
  .action(async (file: string, options: { force?: boolean }) => {
    if (!options.force && (await fs.pathExists(file))) {
      throw new CompilerError(`${file} already exists, use --force to overwrite it`, ErrorCodes.OUTPUT_EXISTS);
    }

    const answers = await promptStarterAnswers();
    await fs.outputFile(file, starterWorkloadYaml(answers));
    Logger.success(`Created ${file}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  Logger.error(errorMessage(err));
  process.exitCode = 1;
});
