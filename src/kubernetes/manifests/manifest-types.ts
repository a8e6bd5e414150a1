/**
 * @fileoverview Kubernetes manifest type definitions and interfaces.
 *
 * This module provides TypeScript interfaces for the subset of Kubernetes
 * resources the compiler emits: Secrets, Deployments, StatefulSets and
 * Services. Optional fields are left out of rendered objects rather than
 * set to `undefined`.
 *
 * @module ManifestTypes
 * @since 1.0.0
 */

/**
 * Metadata common to all Kubernetes resources.
 */
export interface ObjectMeta {
  /** The name of the resource */
  name: string;

  /** The namespace where the resource will be created */
  namespace?: string;

  /** Labels to apply to the resource for identification and selection */
  labels?: Record<string, string>;

  /** Annotations to apply to the resource for additional metadata */
  annotations?: Record<string, string>;
}

/**
 * Base interface for all Kubernetes manifest objects.
 *
 * @interface KubernetesManifest
 * @since 1.0.0
 */
export interface KubernetesManifest {
  /** The API version of the Kubernetes resource */
  apiVersion: string;

  /** The kind of Kubernetes resource (e.g., 'Deployment', 'Service', 'Secret') */
  kind: string;

  metadata: ObjectMeta;
}

/**
 * Opaque Secret. `data` values are base64 encoded.
 */
export interface SecretManifest extends KubernetesManifest {
  apiVersion: "v1";
  kind: "Secret";
  type: "Opaque";
  data: Record<string, string>;
}

/**
 * Probe definition; exactly one of `httpGet` or `exec` is set.
 */
export interface ProbeSpec {
  httpGet?: {
    path: string;
    port: number;
    host?: string;
    scheme?: "HTTP" | "HTTPS";
    httpHeaders?: Array<{ name: string; value: string }>;
  };
  exec?: {
    command: string[];
  };
}

export interface VolumeMountSpec {
  name: string;
  mountPath: string;
  subPath?: string;
  readOnly: boolean;
}

/**
 * Kubernetes container specification.
 *
 * @interface ContainerSpec
 * @since 1.0.0
 */
export interface ContainerSpec {
  /** Container name */
  name: string;

  /** Container image */
  image: string;

  /** Entrypoint override */
  command?: string[];

  /** Command arguments */
  args?: string[];

  /** Environment variables from Secrets */
  envFrom?: Array<{
    secretRef: {
      name: string;
    };
  }>;

  /** Resource requirements */
  resources?: {
    requests?: {
      memory?: string;
      cpu?: string;
    };
    limits?: {
      memory?: string;
      cpu?: string;
    };
  };

  livenessProbe?: ProbeSpec;

  readinessProbe?: ProbeSpec;

  /** Volume mounts */
  volumeMounts?: VolumeMountSpec[];

  securityContext?: {
    allowPrivilegeEscalation: boolean;
    readOnlyRootFilesystem: boolean;
  };
}

export interface VolumeSpec {
  name: string;
  secret?: {
    secretName: string;
    defaultMode?: number;
  };
  persistentVolumeClaim?: {
    claimName: string;
  };
}

/**
 * Kubernetes pod specification.
 *
 * @interface PodSpec
 * @since 1.0.0
 */
export interface PodSpec {
  /** Containers in the pod */
  containers: ContainerSpec[];

  /** Volumes in the pod */
  volumes?: VolumeSpec[];

  serviceAccountName?: string;

  securityContext: {
    runAsNonRoot: boolean;
    seccompProfile: {
      type: "RuntimeDefault";
    };
  };
}

export interface PodTemplateSpec {
  metadata: {
    labels: Record<string, string>;
    annotations: Record<string, string>;
  };
  spec: PodSpec;
}

export interface DeploymentManifest extends KubernetesManifest {
  apiVersion: "apps/v1";
  kind: "Deployment";
  spec: {
    selector: { matchLabels: Record<string, string> };
    template: PodTemplateSpec;
  };
}

export interface StatefulSetManifest extends KubernetesManifest {
  apiVersion: "apps/v1";
  kind: "StatefulSet";
  spec: {
    serviceName: string;
    selector: { matchLabels: Record<string, string> };
    template: PodTemplateSpec;
  };
}

/** The single controller emitted per workload. */
export type WorkloadManifest = DeploymentManifest | StatefulSetManifest;

export interface ServicePortSpec {
  name: string;
  port: number;
  targetPort: number;
  protocol: "TCP" | "UDP" | "SCTP";
}

export interface ServiceManifest extends KubernetesManifest {
  apiVersion: "v1";
  kind: "Service";
  spec: {
    type: "ClusterIP";
    selector: Record<string, string>;
    ports: ServicePortSpec[];
  };
}

export type GeneratedManifest = SecretManifest | WorkloadManifest | ServiceManifest;
