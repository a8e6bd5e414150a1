/**
 * @fileoverview Main entry point for the workload compiler.
 *
 * ## Module Organization:
 * - **Workload**: input schema, normalization and file loading
 * - **Kubernetes**: Secret, workload and Service manifest generation
 * - **Core**: configuration and selector id persistence
 * - **Types**: the normalized workload model
 *
 * ## Usage:
 * ```typescript
 * import { ManifestGenerator, InMemorySelectorStore } from './src/index.ts';
 *
 * const generator = new ManifestGenerator();
 * const compiled = await generator.compileWithStore(workload, new InMemorySelectorStore());
 * process.stdout.write(generator.manifestsToYaml(compiled.manifests));
 * ```
 */

export * from './core/index.ts';
export * from './kubernetes/index.ts';
export * from './workload/index.ts';
export * from './types/index.ts';
export * from './errors.ts';
export * from './constants.ts';
export { Logger } from './logger.ts';
