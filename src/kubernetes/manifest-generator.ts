/**
 * @fileoverview Main ManifestGenerator class that compiles a workload description
 * into Kubernetes manifests using the specialized Secret, workload and Service
 * generators.
 *
 * The pipeline is: schema validation, normalization, Secret materialization,
 * checksum, then workload and Service rendering. Nothing is emitted unless
 * every step succeeds.
 *
 * @since 1.0.0
 * @module ManifestGenerator
 */

import { ManifestValidationError, errorMessage } from '../errors.ts';
import { Logger } from '../logger.ts';
import { resolveSelectorId, selectorKey, type SelectorStore } from '../core/selector-store.ts';
import type { CompilerFeatures, NormalizedWorkload, WorkloadKind } from '../types/workload-types.ts';
import { InputNormalizer } from '../workload/input-normalizer.ts';
import { parseWorkload } from '../workload/workload-schema.ts';
import { ChecksumAnnotator } from './manifests/checksum.ts';
import type {
  GeneratedManifest,
  KubernetesManifest,
  SecretManifest,
  ServiceManifest,
  WorkloadManifest,
} from './manifests/manifest-types.ts';
import { ManifestUtils } from './manifests/manifest-utils.ts';
import { SecretManifests, type MaterializedSecret } from './manifests/secret-manifests.ts';
import { ServiceManifests } from './manifests/service-manifests.ts';
import { WorkloadManifests } from './manifests/workload-manifests.ts';

export interface ManifestGeneratorOptions {
  /** Namespace for workloads that do not declare one */
  defaultNamespace?: string;
  features?: Partial<CompilerFeatures>;
}

/**
 * Summary handed back to the calling orchestrator for cross-referencing.
 */
export interface WorkloadOutputs {
  namespace: string;
  workloadKind: WorkloadKind;
  deploymentName?: string;
  statefulSetName?: string;
  /** Present only when a Service was generated */
  serviceName?: string;
  checksum: string;
  selectorId: string;
  waitForRollout: boolean;
}

export interface CompiledWorkload {
  /** Secrets, then the workload, then the Service */
  manifests: GeneratedManifest[];
  secrets: SecretManifest[];
  materializedSecrets: MaterializedSecret[];
  workload: WorkloadManifest;
  service?: ServiceManifest;
  outputs: WorkloadOutputs;
}

/**
 * Compiles workload descriptions into Kubernetes manifests.
 *
 * @example
 * ```typescript
 * const generator = new ManifestGenerator({ defaultNamespace: 'apps' });
 *
 * // Pure compile with a known selector id
 * const compiled = generator.compile(rawWorkload, '0a1b2c3d4e5f6071');
 *
 * // Or resolve the selector id from a store first
 * const stored = await generator.compileWithStore(rawWorkload, new FileSelectorStore('state.json'));
 *
 * console.log(generator.manifestsToYaml(stored.manifests));
 * ```
 *
 * @since 1.0.0
 */
export class ManifestGenerator {
  private readonly normalizer: InputNormalizer;
  private readonly secretGenerator: SecretManifests;
  private readonly workloadGenerator: WorkloadManifests;
  private readonly serviceGenerator: ServiceManifests;

  constructor(options: ManifestGeneratorOptions = {}) {
    this.normalizer = new InputNormalizer({
      defaultNamespace: options.defaultNamespace,
      features: options.features,
    });
    this.secretGenerator = new SecretManifests();
    this.workloadGenerator = new WorkloadManifests();
    this.serviceGenerator = new ServiceManifests();
  }

  /**
   * Compiles a raw workload description with the given selector id.
   *
   * Same input and selector id always produce the same manifests.
   *
   * @throws {WorkloadValidationError} When the input is invalid
   * @throws {ManifestValidationError} When a generated manifest is invalid
   */
  compile(raw: unknown, selectorId: string): CompiledWorkload {
    return this.render(this.normalizer.normalize(parseWorkload(raw)), selectorId);
  }

  /**
   * Compiles a workload, taking its selector id from `store` and creating
   * one there if this is the workload's first compile.
   *
   * The input is validated before the store is touched, so an invalid
   * workload never reserves an identifier.
   */
  async compileWithStore(
    raw: unknown,
    store: SelectorStore,
    generateId?: () => string,
  ): Promise<CompiledWorkload> {
    const workload = this.normalizer.normalize(parseWorkload(raw));
    const selectorId = await resolveSelectorId(store, selectorKey(workload.namespace, workload.name), generateId);
    return this.render(workload, selectorId);
  }

  private render(workload: NormalizedWorkload, selectorId: string): CompiledWorkload {
    if (selectorId === '' || !ManifestUtils.validateLabelValue(selectorId)) {
      throw new ManifestValidationError(`Invalid selector id: ${selectorId}`);
    }

    Logger.info(`Generating manifests for ${workload.kind}: ${workload.namespace}/${workload.name}`);

    const materializedSecrets = this.secretGenerator.materialize(workload);
    const secrets = materializedSecrets.map((secret) => this.secretGenerator.generateSecret(workload, secret));
    const checksum = ChecksumAnnotator.compute(materializedSecrets);

    const workloadManifest = this.workloadGenerator.generateWorkload(workload, {
      selectorId,
      checksum,
      secrets: materializedSecrets,
    });
    const service = this.serviceGenerator.generateService(workload, selectorId);

    const manifests: GeneratedManifest[] = [...secrets, workloadManifest];
    if (service) {
      manifests.push(service);
    }

    for (const manifest of manifests) {
      this.validateManifest(manifest);
    }

    const outputs: WorkloadOutputs = {
      namespace: workload.namespace,
      workloadKind: workload.kind,
      checksum,
      selectorId,
      waitForRollout: workload.waitForRollout,
    };
    if (workloadManifest.kind === 'Deployment') {
      outputs.deploymentName = workloadManifest.metadata.name;
    } else {
      outputs.statefulSetName = workloadManifest.metadata.name;
    }
    if (service) {
      outputs.serviceName = service.metadata.name;
    }

    Logger.info(`Generated ${manifests.length} manifests for ${workload.namespace}/${workload.name}`);

    const compiled: CompiledWorkload = {
      manifests,
      secrets,
      materializedSecrets,
      workload: workloadManifest,
      outputs,
    };
    if (service) {
      compiled.service = service;
    }
    return compiled;
  }

  /**
   * Convert an array of Kubernetes manifests to YAML format.
   *
   * @returns YAML string with multiple documents separated by '---'
   */
  manifestsToYaml(manifests: KubernetesManifest[]): string {
    Logger.debug(`Converting ${manifests.length} manifests to YAML`);
    return manifests.map(manifest => ManifestUtils.renderManifest(manifest)).join('---\n');
  }

  /**
   * Validate a single Kubernetes manifest.
   *
   * @returns True if valid, throws error if invalid
   */
  validateManifest(manifest: KubernetesManifest): boolean {
    try {
      ManifestUtils.validateManifest(manifest);
    } catch (err) {
      Logger.error(`Manifest validation failed for ${manifest.kind}/${manifest.metadata.name}: ${errorMessage(err)}`);
      throw err;
    }
    return true;
  }
}
