/**
 * @fileoverview Resolves defaults and cross-field rules for parsed workloads.
 *
 * @module InputNormalizer
 * @since 1.0.0
 */

import { DEFAULT_FEATURES, DEFAULT_NAMESPACE, DEFAULT_WORKLOAD_KIND, WORKLOAD_KIND_ANNOTATION, WORKLOAD_KINDS } from "../constants.ts";
import { WorkloadValidationError } from "../errors.ts";
import { Logger } from "../logger.ts";
import type {
  CompilerFeatures,
  NormalizedContainer,
  NormalizedFile,
  NormalizedProbe,
  NormalizedServicePort,
  NormalizedVolume,
  NormalizedWorkload,
  ResourceQuantities,
  ResourceRequirements,
  WorkloadKind,
} from "../types/workload-types.ts";
import type { ContainerInput, FileInput, ProbeInput, WorkloadInput } from "./workload-schema.ts";

export interface NormalizerOptions {
  defaultNamespace?: string;
  features?: Partial<CompilerFeatures>;
}

/**
 * Turns a schema-valid {@link WorkloadInput} into a {@link NormalizedWorkload}.
 *
 * Problems are collected across the whole input and raised together, so a
 * caller sees every issue from one run.
 *
 * @example
 * ```typescript
 * const normalizer = new InputNormalizer({ features: { hardenContainers: false } });
 * const workload = normalizer.normalize(parseWorkload(raw));
 * ```
 */
export class InputNormalizer {
  private readonly defaultNamespace: string;
  private readonly features: CompilerFeatures;

  constructor(options: NormalizerOptions = {}) {
    this.defaultNamespace = options.defaultNamespace ?? DEFAULT_NAMESPACE;
    this.features = {
      hardenContainers: options.features?.hardenContainers ?? DEFAULT_FEATURES.hardenContainers,
      binaryContent: options.features?.binaryContent ?? DEFAULT_FEATURES.binaryContent,
    };
  }

  /**
   * @throws {WorkloadValidationError} when conflicting or unresolvable fields are found
   */
  normalize(input: WorkloadInput): NormalizedWorkload {
    const issues: string[] = [];
    const namespace = input.namespace ?? this.defaultNamespace;
    const annotations = { ...input.annotations };

    const placeholders = new Map<string, string>([
      ["metadata.name", input.name],
      ["metadata.namespace", namespace],
    ]);
    for (const [key, value] of Object.entries(annotations)) {
      placeholders.set(`metadata.annotations.${key}`, value);
    }

    const containers = Object.keys(input.containers)
      .sort()
      .map((key) => this.normalizeContainer(key, input.containers[key], placeholders, issues));

    this.checkMountPaths(containers, issues);

    if (issues.length > 0) {
      throw new WorkloadValidationError(issues);
    }

    const workload: NormalizedWorkload = {
      name: input.name,
      namespace,
      kind: this.resolveKind(input),
      annotations,
      additionalAnnotations: { ...input.additionalAnnotations },
      waitForRollout: input.waitForRollout ?? true,
      containers,
      servicePorts: this.normalizeServicePorts(input),
      features: { ...this.features },
    };
    if (input.serviceAccountName !== undefined) {
      workload.serviceAccountName = input.serviceAccountName;
    }

    Logger.debug(`Normalized workload ${namespace}/${input.name} as ${workload.kind} with ${containers.length} container(s)`);
    return workload;
  }

  /**
   * Picks the workload kind from `workloadType`, then the kind annotation,
   * then the default. Unrecognized values fall back to the default.
   */
  resolveKind(input: WorkloadInput): WorkloadKind {
    const requested = input.workloadType ?? input.annotations?.[WORKLOAD_KIND_ANNOTATION];
    if (requested === undefined) {
      return DEFAULT_WORKLOAD_KIND;
    }

    const kind = WORKLOAD_KINDS.find((candidate) => candidate.toLowerCase() === requested.trim().toLowerCase());
    if (!kind) {
      Logger.warning(`Unrecognized workload kind "${requested}" for ${input.name}, using ${DEFAULT_WORKLOAD_KIND}`);
      return DEFAULT_WORKLOAD_KIND;
    }
    return kind;
  }

  private normalizeContainer(
    key: string,
    input: ContainerInput,
    placeholders: ReadonlyMap<string, string>,
    issues: string[],
  ): NormalizedContainer {
    const files = Object.keys(input.files ?? {})
      .sort()
      .flatMap((path) => {
        const file = input.files?.[path];
        if (!file) return [];
        const normalized = this.normalizeFile(`containers.${key}.files.${path}`, path, file, placeholders, issues);
        return normalized ? [normalized] : [];
      });

    const volumeInputs = input.volumes ?? {};
    const volumes: NormalizedVolume[] = Object.keys(volumeInputs)
      .sort()
      .map((path) => {
        const volume = volumeInputs[path];
        return {
          path,
          source: volume.source,
          ...(volume.path !== undefined && { subPath: volume.path }),
          readOnly: volume.readOnly ?? false,
        };
      });

    const container: NormalizedContainer = {
      key,
      image: input.image,
      variables: { ...input.variables },
      files,
      volumes,
    };

    if (input.command) container.command = [...input.command];
    if (input.args) container.args = [...input.args];

    const resources = this.normalizeResources(input);
    if (resources) container.resources = resources;

    if (input.livenessProbe) container.livenessProbe = this.normalizeProbe(input.livenessProbe);
    if (input.readinessProbe) container.readinessProbe = this.normalizeProbe(input.readinessProbe);

    return container;
  }

  private normalizeFile(
    where: string,
    path: string,
    file: FileInput,
    placeholders: ReadonlyMap<string, string>,
    issues: string[],
  ): NormalizedFile | undefined {
    let binaryContent = file.binaryContent;
    if (binaryContent !== undefined && !this.features.binaryContent) {
      Logger.warning(`${where}: binaryContent is disabled, ignoring it`);
      binaryContent = undefined;
    }

    const hasInline = file.content !== undefined || binaryContent !== undefined;

    if (file.content !== undefined && binaryContent !== undefined) {
      issues.push(`${where}: content and binaryContent are mutually exclusive`);
      return undefined;
    }
    if (hasInline && file.source !== undefined) {
      issues.push(`${where}: source and inline content are mutually exclusive`);
      return undefined;
    }

    const mode = file.mode !== undefined ? parseInt(file.mode, 8) : undefined;

    if (binaryContent !== undefined) {
      return { type: "binary", path, content: binaryContent, ...(mode !== undefined && { mode }) };
    }

    if (file.content !== undefined) {
      const content = file.noExpand ? file.content : this.expandPlaceholders(where, file.content, placeholders, issues);
      return { type: "text", path, content, ...(mode !== undefined && { mode }) };
    }

    if (file.source !== undefined) {
      return { type: "source", path, source: file.source };
    }

    issues.push(`${where}: file has no usable content`);
    return undefined;
  }

  /**
   * Resolves `${...}` references in file content. `$$` stands for a literal `$`.
   */
  expandPlaceholders(
    where: string,
    content: string,
    placeholders: ReadonlyMap<string, string>,
    issues: string[],
  ): string {
    return content.replace(/\$\$|\$\{([^}]*)\}/g, (match: string, reference: string | undefined) => {
      if (match === "$$") return "$";
      const ref = (reference ?? "").trim();
      const value = placeholders.get(ref);
      if (value === undefined) {
        issues.push(`${where}: unresolved placeholder \${${ref}}`);
        return match;
      }
      return value;
    });
  }

  private normalizeResources(input: ContainerInput): ResourceRequirements | undefined {
    const limits = this.pickQuantities(input.resources?.limits);
    const requests = this.pickQuantities(input.resources?.requests);
    if (!limits && !requests) return undefined;
    return {
      ...(limits && { limits }),
      ...(requests && { requests }),
    };
  }

  private pickQuantities(quantities: ResourceQuantities | undefined): ResourceQuantities | undefined {
    if (!quantities) return undefined;
    const picked: ResourceQuantities = {};
    if (quantities.cpu !== undefined) picked.cpu = quantities.cpu;
    if (quantities.memory !== undefined) picked.memory = quantities.memory;
    return Object.keys(picked).length > 0 ? picked : undefined;
  }

  private normalizeProbe(probe: ProbeInput): NormalizedProbe {
    if (probe.httpGet) {
      const { path, port, host, scheme, httpHeaders } = probe.httpGet;
      return {
        type: "httpGet",
        path,
        port,
        ...(host !== undefined && { host }),
        ...(scheme !== undefined && { scheme }),
        ...(httpHeaders !== undefined && { httpHeaders: httpHeaders.map((header) => ({ ...header })) }),
      };
    }
    // The schema guarantees exactly one of httpGet or exec.
    return { type: "exec", command: [...(probe.exec?.command ?? [])] };
  }

  private normalizeServicePorts(input: WorkloadInput): NormalizedServicePort[] {
    const ports = input.service?.ports ?? {};
    return Object.keys(ports)
      .sort()
      .map((name) => ({
        name,
        port: ports[name].port,
        targetPort: ports[name].targetPort ?? ports[name].port,
        protocol: ports[name].protocol ?? "TCP",
      }));
  }

  /**
   * Mount paths share one pod-wide namespace: two mounts at the same path,
   * in the same or different containers, are rejected.
   */
  private checkMountPaths(containers: NormalizedContainer[], issues: string[]): void {
    const owners = new Map<string, string>();
    for (const container of containers) {
      const mounts = [
        ...container.files
          .filter((file) => file.type !== "source")
          .map((file) => ({ path: file.path, owner: `containers.${container.key}.files` })),
        ...container.volumes.map((volume) => ({ path: volume.path, owner: `containers.${container.key}.volumes` })),
      ];
      for (const mount of mounts) {
        const existing = owners.get(mount.path);
        if (existing) {
          issues.push(`mount path ${mount.path} is declared by both ${existing} and ${mount.owner}`);
        } else {
          owners.set(mount.path, mount.owner);
        }
      }
    }
  }
}
