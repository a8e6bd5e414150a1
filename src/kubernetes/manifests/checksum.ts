/**
 * @fileoverview Pod template checksum over all materialized Secret data.
 *
 * Secrets are updated in place, so the pod template would not change when
 * only their content does. Embedding a digest of that content as an
 * annotation makes the controller roll the pods.
 *
 * @module Checksum
 * @since 1.0.0
 */

import { createHash } from 'node:crypto';
import { CHECKSUM_ANNOTATION } from '../../constants.ts';
import type { MaterializedSecret } from './secret-manifests.ts';

type SortedEntries = Array<[string, string]>;

function sortedEntries(record: Record<string, string>): SortedEntries {
  return Object.keys(record)
    .sort()
    .map((key): [string, string] => [key, record[key]]);
}

export class ChecksumAnnotator {

  /**
   * Serializes the secrets as a JSON array of
   * `[id, { text: [[key, value]...], binary: [[key, value]...] }]`
   * with ids and data keys in lexicographic order.
   */
  static canonicalize(secrets: MaterializedSecret[]): string {
    const ordered = [...secrets]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((secret) => [
        secret.id,
        {
          text: sortedEntries(secret.textData),
          binary: sortedEntries(secret.binaryData),
        },
      ]);
    return JSON.stringify(ordered);
  }

  /**
   * SHA-256 hex digest of the canonical form.
   */
  static compute(secrets: MaterializedSecret[]): string {
    return createHash('sha256').update(ChecksumAnnotator.canonicalize(secrets), 'utf8').digest('hex');
  }

  /**
   * Returns `annotations` with the checksum annotation set.
   */
  static annotate(annotations: Record<string, string>, checksum: string): Record<string, string> {
    return { ...annotations, [CHECKSUM_ANNOTATION]: checksum };
  }
}
