/**
 * @fileoverview Normalized workload model.
 *
 * These types describe a workload after defaults have been resolved and
 * mutually exclusive fields have been collapsed into tagged unions. The
 * renderers only ever see this model, never the raw input.
 *
 * @module WorkloadTypes
 * @since 1.0.0
 */

/** The two controller kinds a workload can be rendered as. */
export type WorkloadKind = "Deployment" | "StatefulSet";

/**
 * Feature flags that replace the legacy and current schema variants.
 */
export interface CompilerFeatures {
  /** Add `allowPrivilegeEscalation: false` and a read-only root filesystem to every container */
  hardenContainers: boolean;

  /** Honor `binaryContent` on files; when off only `content` is read */
  binaryContent: boolean;
}

export interface ResourceQuantities {
  cpu?: string;
  memory?: string;
}

export interface ResourceRequirements {
  limits?: ResourceQuantities;
  requests?: ResourceQuantities;
}

export interface HttpHeader {
  name: string;
  value: string;
}

export type NormalizedProbe =
  | {
    type: "httpGet";
    path: string;
    port: number;
    host?: string;
    scheme?: "HTTP" | "HTTPS";
    httpHeaders?: HttpHeader[];
  }
  | {
    type: "exec";
    command: string[];
  };

/**
 * A file to place in a container.
 *
 * Only `text` and `binary` files are materialized as Secrets; `source`
 * files reference content the compiler does not own.
 */
export type NormalizedFile =
  | { type: "text"; path: string; content: string; mode?: number }
  | { type: "binary"; path: string; content: string; mode?: number }
  | { type: "source"; path: string; source: string };

/** An external persistent volume claim mounted into a container. */
export interface NormalizedVolume {
  /** Absolute mount path inside the container */
  path: string;

  /** Name of the persistent volume claim */
  source: string;

  /** Sub-path within the volume */
  subPath?: string;

  readOnly: boolean;
}

export interface NormalizedContainer {
  /** Container key; doubles as the container name */
  key: string;
  image: string;
  command?: string[];
  args?: string[];
  /** Environment variables, empty when none were declared */
  variables: Record<string, string>;
  files: NormalizedFile[];
  volumes: NormalizedVolume[];
  resources?: ResourceRequirements;
  livenessProbe?: NormalizedProbe;
  readinessProbe?: NormalizedProbe;
}

export interface NormalizedServicePort {
  name: string;
  port: number;
  targetPort: number;
  protocol: "TCP" | "UDP" | "SCTP";
}

/**
 * A fully defaulted workload, ready to render.
 */
export interface NormalizedWorkload {
  name: string;
  namespace: string;
  kind: WorkloadKind;
  /** User annotations, applied to the workload and its pod template */
  annotations: Record<string, string>;
  /** Annotations applied to the pod template only */
  additionalAnnotations: Record<string, string>;
  serviceAccountName?: string;
  waitForRollout: boolean;
  /** Sorted by container key */
  containers: NormalizedContainer[];
  /** Sorted by port name; empty when no Service should be emitted */
  servicePorts: NormalizedServicePort[];
  features: CompilerFeatures;
}
