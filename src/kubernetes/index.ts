/**
 * @fileoverview Kubernetes manifest generation.
 *
 * - ManifestGenerator: compiles workload descriptions into manifests
 * - SecretManifests / ChecksumAnnotator / WorkloadManifests / ServiceManifests: the individual stages
 * - Manifest types for the emitted resources
 */

export { ManifestGenerator } from './manifest-generator.ts';
export type { CompiledWorkload, ManifestGeneratorOptions, WorkloadOutputs } from './manifest-generator.ts';
export { ManifestUtils } from './manifests/manifest-utils.ts';
export { SecretManifests } from './manifests/secret-manifests.ts';
export type { EnvSecret, FileSecret, MaterializedSecret } from './manifests/secret-manifests.ts';
export { ChecksumAnnotator } from './manifests/checksum.ts';
export { WorkloadManifests } from './manifests/workload-manifests.ts';
export type { WorkloadRenderContext } from './manifests/workload-manifests.ts';
export { ServiceManifests } from './manifests/service-manifests.ts';
export type * from './manifests/manifest-types.ts';
