/**
 * @fileoverview Secret materialization for environment variables and inline files.
 *
 * Each container with variables gets one env Secret, and each file with
 * inline content gets its own single-key Secret. Secrets are never merged.
 *
 * @module SecretManifests
 * @since 1.0.0
 */

import { posix } from 'node:path';
import { Logger } from '../../logger.ts';
import type { NormalizedWorkload } from '../../types/workload-types.ts';
import type { SecretManifest } from './manifest-types.ts';
import { ManifestUtils } from './manifest-utils.ts';

interface BaseSecret {
  /** Composite key used for checksum ordering (`env-web`, `file-web-<hash>`) */
  id: string;

  /** Secret resource name */
  name: string;

  containerKey: string;

  /** Plain values; base64 encoded when rendered */
  textData: Record<string, string>;

  /** Values that are already base64 encoded */
  binaryData: Record<string, string>;
}

export interface EnvSecret extends BaseSecret {
  type: 'env';
}

export interface FileSecret extends BaseSecret {
  type: 'file';

  /** Absolute path the file is mounted at */
  mountPath: string;

  /** The single data key, the final segment of the mount path */
  dataKey: string;

  /** Pod volume name for this Secret */
  volumeName: string;

  mode?: number;
}

export type MaterializedSecret = EnvSecret | FileSecret;

/**
 * Derives and renders the Secrets of a workload.
 *
 * @example
 * ```typescript
 * const secrets = new SecretManifests();
 * const materialized = secrets.materialize(workload);
 * const manifests = materialized.map(secret => secrets.generateSecret(workload, secret));
 * ```
 */
export class SecretManifests {

  /**
   * Collects every Secret the workload needs, sorted by composite key.
   */
  materialize(workload: NormalizedWorkload): MaterializedSecret[] {
    const secrets: MaterializedSecret[] = [];

    for (const container of workload.containers) {
      if (Object.keys(container.variables).length > 0) {
        secrets.push({
          type: 'env',
          id: `env-${container.key}`,
          name: SecretManifests.envSecretName(workload.name, container.key),
          containerKey: container.key,
          textData: { ...container.variables },
          binaryData: {},
        });
      }

      for (const file of container.files) {
        if (file.type === 'source') {
          Logger.debug(`Skipping ${container.key}:${file.path}, content comes from ${file.source}`);
          continue;
        }

        const pathHash = ManifestUtils.shortHash(file.path);
        const dataKey = posix.basename(file.path);
        secrets.push({
          type: 'file',
          id: `file-${container.key}-${pathHash}`,
          name: SecretManifests.fileSecretName(workload.name, container.key, file.path),
          containerKey: container.key,
          textData: file.type === 'text' ? { [dataKey]: file.content } : {},
          binaryData: file.type === 'binary' ? { [dataKey]: file.content } : {},
          mountPath: file.path,
          dataKey,
          volumeName: `file-${ManifestUtils.shortHash(`${container.key}:${file.path}`)}`,
          ...(file.mode !== undefined && { mode: file.mode }),
        });
      }
    }

    return secrets.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  static envSecretName(workloadName: string, containerKey: string): string {
    return ManifestUtils.generateResourceName(workloadName, containerKey, 'env');
  }

  static fileSecretName(workloadName: string, containerKey: string, mountPath: string): string {
    return ManifestUtils.generateResourceName(workloadName, containerKey, ManifestUtils.shortHash(mountPath));
  }

  /**
   * Renders a materialized Secret. Text values are base64 encoded here;
   * binary values already are.
   */
  generateSecret(workload: NormalizedWorkload, secret: MaterializedSecret): SecretManifest {
    const data: Record<string, string> = {};
    for (const [key, value] of Object.entries(secret.textData)) {
      data[key] = ManifestUtils.encodeBase64(value);
    }
    Object.assign(data, secret.binaryData);

    return {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {
        name: secret.name,
        namespace: workload.namespace,
        labels: ManifestUtils.standardLabels(workload.name),
      },
      type: 'Opaque',
      data: ManifestUtils.sortRecord(data),
    };
  }
}
