import type { CompilerFeatures, WorkloadKind } from "./types/workload-types.ts";

/** Annotation consulted for the workload kind when `workloadType` is absent. */
export const WORKLOAD_KIND_ANNOTATION = "workload-compiler.dev/kind";

/** Pod label carrying the persisted selector identifier. */
export const SELECTOR_LABEL = "workload-compiler.dev/selector";

export const CHECKSUM_ANNOTATION = "checksum/config";

export const MANAGED_BY = "workload-compiler";

export const DEFAULT_NAMESPACE = "default";

export const DEFAULT_WORKLOAD_KIND: WorkloadKind = "Deployment";

export const WORKLOAD_KINDS: readonly WorkloadKind[] = ["Deployment", "StatefulSet"];

export const DEFAULT_FEATURES: CompilerFeatures = {
  hardenContainers: true,
  binaryContent: true,
};

export const CONFIG_FILE = "workload-compiler.json";

export const DEFAULT_STATE_FILE = ".workload-compiler/state.json";

/** Hex characters of SHA-256 kept in derived resource names. */
export const NAME_HASH_LENGTH = 10;

/** Random bytes in a selector identifier. */
export const SELECTOR_ID_BYTES = 8;
