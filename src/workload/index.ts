/**
 * @fileoverview Workload input handling: schema, normalization and file loading.
 */

export { parseWorkload, workloadSchema, formatIssues } from './workload-schema.ts';
export type { WorkloadInput, ContainerInput, FileInput, VolumeInput, ProbeInput, ServicePortInput } from './workload-schema.ts';
export { InputNormalizer } from './input-normalizer.ts';
export type { NormalizerOptions } from './input-normalizer.ts';
export { loadWorkloadFile } from './workload-loader.ts';
