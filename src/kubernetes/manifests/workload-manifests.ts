/**
 * @fileoverview Deployment and StatefulSet rendering.
 *
 * Both controller kinds share one pod template; the workload kind only
 * decides which envelope wraps it.
 *
 * @module WorkloadManifests
 * @since 1.0.0
 */

import { SELECTOR_LABEL } from '../../constants.ts';
import type { NormalizedContainer, NormalizedProbe, NormalizedWorkload } from '../../types/workload-types.ts';
import { ChecksumAnnotator } from './checksum.ts';
import type {
  ContainerSpec,
  ObjectMeta,
  PodTemplateSpec,
  ProbeSpec,
  VolumeMountSpec,
  VolumeSpec,
  WorkloadManifest,
} from './manifest-types.ts';
import { ManifestUtils } from './manifest-utils.ts';
import type { FileSecret, MaterializedSecret } from './secret-manifests.ts';

export interface WorkloadRenderContext {
  /** Persisted selector identifier */
  selectorId: string;

  /** Digest of all materialized Secret data */
  checksum: string;

  secrets: MaterializedSecret[];
}

/**
 * Renders the single controller of a workload.
 *
 * @example
 * ```typescript
 * const renderer = new WorkloadManifests();
 * const manifest = renderer.generateWorkload(workload, { selectorId, checksum, secrets });
 * ```
 */
export class WorkloadManifests {

  generateWorkload(workload: NormalizedWorkload, context: WorkloadRenderContext): WorkloadManifest {
    const metadata: ObjectMeta = {
      name: workload.name,
      namespace: workload.namespace,
      labels: ManifestUtils.standardLabels(workload.name),
    };
    if (Object.keys(workload.annotations).length > 0) {
      metadata.annotations = ManifestUtils.sortRecord(workload.annotations);
    }

    const selector = { matchLabels: WorkloadManifests.selectorLabels(context.selectorId) };
    const template = this.generatePodTemplate(workload, context);

    switch (workload.kind) {
      case 'Deployment':
        return {
          apiVersion: 'apps/v1',
          kind: 'Deployment',
          metadata,
          spec: { selector, template },
        };
      case 'StatefulSet':
        return {
          apiVersion: 'apps/v1',
          kind: 'StatefulSet',
          metadata,
          spec: { serviceName: workload.name, selector, template },
        };
    }
  }

  static selectorLabels(selectorId: string): Record<string, string> {
    return { [SELECTOR_LABEL]: selectorId };
  }

  private generatePodTemplate(workload: NormalizedWorkload, context: WorkloadRenderContext): PodTemplateSpec {
    const annotations = ChecksumAnnotator.annotate(
      ManifestUtils.mergeRecords(workload.annotations, workload.additionalAnnotations),
      context.checksum,
    );

    const template: PodTemplateSpec = {
      metadata: {
        labels: ManifestUtils.mergeRecords(
          ManifestUtils.standardLabels(workload.name),
          WorkloadManifests.selectorLabels(context.selectorId),
        ),
        annotations: ManifestUtils.sortRecord(annotations),
      },
      spec: {
        containers: workload.containers.map((container) => this.generateContainer(workload, container, context.secrets)),
        securityContext: {
          runAsNonRoot: true,
          seccompProfile: { type: 'RuntimeDefault' },
        },
      },
    };

    const volumes = this.generateVolumes(workload, context.secrets);
    if (volumes.length > 0) {
      template.spec.volumes = volumes;
    }

    if (workload.serviceAccountName) {
      template.spec.serviceAccountName = workload.serviceAccountName;
    }

    return template;
  }

  private generateContainer(
    workload: NormalizedWorkload,
    container: NormalizedContainer,
    secrets: MaterializedSecret[],
  ): ContainerSpec {
    const spec: ContainerSpec = {
      name: container.key,
      image: container.image,
    };

    if (container.command) spec.command = [...container.command];
    if (container.args) spec.args = [...container.args];

    const envSecret = secrets.find((secret) => secret.type === 'env' && secret.containerKey === container.key);
    if (envSecret) {
      spec.envFrom = [{ secretRef: { name: envSecret.name } }];
    }

    if (container.resources) {
      spec.resources = {
        ...(container.resources.limits && { limits: { ...container.resources.limits } }),
        ...(container.resources.requests && { requests: { ...container.resources.requests } }),
      };
    }

    if (container.livenessProbe) spec.livenessProbe = this.generateProbe(container.livenessProbe);
    if (container.readinessProbe) spec.readinessProbe = this.generateProbe(container.readinessProbe);

    const volumeMounts: VolumeMountSpec[] = [
      ...this.fileSecretsOf(container.key, secrets).map((secret) => ({
        name: secret.volumeName,
        mountPath: secret.mountPath,
        subPath: secret.dataKey,
        readOnly: true,
      })),
      ...container.volumes.map((volume) => ({
        name: WorkloadManifests.claimVolumeName(volume.source),
        mountPath: volume.path,
        ...(volume.subPath !== undefined && { subPath: volume.subPath }),
        readOnly: volume.readOnly,
      })),
    ];
    if (volumeMounts.length > 0) {
      spec.volumeMounts = volumeMounts;
    }

    if (workload.features.hardenContainers) {
      spec.securityContext = {
        allowPrivilegeEscalation: false,
        readOnlyRootFilesystem: true,
      };
    }

    return spec;
  }

  private generateProbe(probe: NormalizedProbe): ProbeSpec {
    switch (probe.type) {
      case 'httpGet':
        return {
          httpGet: {
            path: probe.path,
            port: probe.port,
            ...(probe.host !== undefined && { host: probe.host }),
            ...(probe.scheme !== undefined && { scheme: probe.scheme }),
            ...(probe.httpHeaders !== undefined && { httpHeaders: probe.httpHeaders.map((header) => ({ ...header })) }),
          },
        };
      case 'exec':
        return { exec: { command: [...probe.command] } };
    }
  }

  /**
   * One Secret volume per file Secret, then one claim volume per distinct
   * claim across all containers.
   */
  private generateVolumes(workload: NormalizedWorkload, secrets: MaterializedSecret[]): VolumeSpec[] {
    const volumes: VolumeSpec[] = [];

    for (const secret of secrets) {
      if (secret.type !== 'file') continue;
      volumes.push({
        name: secret.volumeName,
        secret: {
          secretName: secret.name,
          ...(secret.mode !== undefined && { defaultMode: secret.mode }),
        },
      });
    }

    const claims = new Set<string>();
    for (const container of workload.containers) {
      for (const volume of container.volumes) {
        claims.add(volume.source);
      }
    }
    for (const claim of [...claims].sort()) {
      volumes.push({
        name: WorkloadManifests.claimVolumeName(claim),
        persistentVolumeClaim: { claimName: claim },
      });
    }

    return volumes;
  }

  private fileSecretsOf(containerKey: string, secrets: MaterializedSecret[]): FileSecret[] {
    return secrets.filter((secret): secret is FileSecret => secret.type === 'file' && secret.containerKey === containerKey);
  }

  static claimVolumeName(claim: string): string {
    return `claim-${ManifestUtils.shortHash(claim)}`;
  }
}
