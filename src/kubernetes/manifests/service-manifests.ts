/**
 * @fileoverview Service manifest generation.
 *
 * @module ServiceManifests
 * @since 1.0.0
 */

import type { NormalizedWorkload } from '../../types/workload-types.ts';
import type { ServiceManifest } from './manifest-types.ts';
import { ManifestUtils } from './manifest-utils.ts';
import { WorkloadManifests } from './workload-manifests.ts';

export class ServiceManifests {

  /**
   * Generates a ClusterIP Service for the workload, or `undefined` when no
   * ports are declared. The Service selects pods by the same selector label
   * as the workload.
   */
  generateService(workload: NormalizedWorkload, selectorId: string): ServiceManifest | undefined {
    if (workload.servicePorts.length === 0) {
      return undefined;
    }

    return {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: {
        name: workload.name,
        namespace: workload.namespace,
        labels: ManifestUtils.standardLabels(workload.name),
      },
      spec: {
        type: 'ClusterIP',
        selector: WorkloadManifests.selectorLabels(selectorId),
        ports: workload.servicePorts.map((port) => ({
          name: port.name,
          port: port.port,
          targetPort: port.targetPort,
          protocol: port.protocol,
        })),
      },
    };
  }
}
