/**
 * @fileoverview Utility functions for Kubernetes manifest generation and processing.
 *
 * This module provides common utility functions used across the manifest
 * generators including naming, hashing, validation and YAML rendering.
 *
 * @module ManifestUtils
 * @since 1.0.0
 */

import { createHash } from 'node:crypto';
import { stringify as yamlStringify } from 'yaml';
import { MANAGED_BY, NAME_HASH_LENGTH } from '../../constants.ts';
import { ManifestValidationError, errorMessage } from '../../errors.ts';
import { Logger } from '../../logger.ts';
import type { KubernetesManifest, SecretManifest } from './manifest-types.ts';

function isSecretManifest(manifest: KubernetesManifest): manifest is SecretManifest {
  return manifest.kind === 'Secret' && 'data' in manifest;
}

/**
 * Utility functions for manifest generation and processing.
 *
 * @class ManifestUtils
 * @since 1.0.0
 */
export class ManifestUtils {

  /**
   * Validates that a namespace name follows Kubernetes naming conventions.
   *
   * Kubernetes namespace names must:
   * - Be lowercase
   * - Contain only alphanumeric characters and hyphens
   * - Start and end with alphanumeric characters
   * - Be 63 characters or less
   *
   * @example
   * ```typescript
   * ManifestUtils.validateNamespace('my-app'); // true
   * ManifestUtils.validateNamespace('My-App'); // false (uppercase)
   * ```
   */
  static validateNamespace(namespace: string): boolean {
    const namespaceRegex = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
    return namespaceRegex.test(namespace) && namespace.length <= 63;
  }

  /**
   * Validates that a resource name follows Kubernetes naming conventions
   * (DNS-1123 subdomain, 253 characters or less).
   */
  static validateResourceName(name: string): boolean {
    const nameRegex = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;
    return nameRegex.test(name) && name.length <= 253;
  }

  /**
   * Validates a label value: empty, or up to 63 alphanumerics, `-`, `_`
   * and `.` that start and end alphanumeric.
   */
  static validateLabelValue(value: string): boolean {
    const valueRegex = /^(([A-Za-z0-9][-A-Za-z0-9_.]*)?[A-Za-z0-9])?$/;
    return valueRegex.test(value) && value.length <= 63;
  }

  /**
   * Validates a Service name. Services need a DNS-1035 label, which must
   * start with a letter.
   */
  static validateServiceName(name: string): boolean {
    const serviceNameRegex = /^[a-z]([-a-z0-9]*[a-z0-9])?$/;
    return serviceNameRegex.test(name) && name.length <= 63;
  }

  /**
   * Validates a Secret data key: alphanumerics, `-`, `_` and `.`, and
   * neither `.`, `..` nor anything starting with `..`.
   */
  static validateDataKey(key: string): boolean {
    const keyRegex = /^[-._a-zA-Z0-9]+$/;
    return keyRegex.test(key) && key.length <= 253 && key !== '.' && !key.startsWith('..');
  }

  /**
   * Returns the first `length` hex characters of the SHA-256 of `value`.
   *
   * @example
   * ```typescript
   * ManifestUtils.shortHash('/etc/app/config.yaml'); // 10 hex characters
   * ```
   */
  static shortHash(value: string, length: number = NAME_HASH_LENGTH): string {
    return createHash('sha256').update(value, 'utf8').digest('hex').slice(0, length);
  }

  static encodeBase64(value: string): string {
    return Buffer.from(value, 'utf8').toString('base64');
  }

  /**
   * Labels carried by every resource generated for a workload.
   */
  static standardLabels(workloadName: string): Record<string, string> {
    return {
      'app.kubernetes.io/name': workloadName,
      'app.kubernetes.io/managed-by': MANAGED_BY,
    };
  }

  /**
   * Merges string maps with later sources taking precedence over earlier ones.
   *
   * @example
   * ```typescript
   * const merged = ManifestUtils.mergeRecords({ a: '1', b: '1' }, { b: '2' });
   * // Returns { a: '1', b: '2' }
   * ```
   */
  static mergeRecords(...sources: Array<Record<string, string> | undefined>): Record<string, string> {
    const merged: Record<string, string> = {};

    for (const source of sources) {
      if (source) {
        Object.assign(merged, source);
      }
    }

    return merged;
  }

  /**
   * Generates a resource name from the workload name and further parts.
   *
   * @example
   * ```typescript
   * ManifestUtils.generateResourceName('my-app', 'web', 'env'); // 'my-app-web-env'
   * ```
   */
  static generateResourceName(workloadName: string, ...parts: string[]): string {
    return [workloadName, ...parts].join('-').toLowerCase();
  }

  /**
   * Returns a copy of `record` with its keys in lexicographic order.
   */
  static sortRecord(record: Record<string, string>): Record<string, string> {
    const sorted: Record<string, string> = {};
    for (const key of Object.keys(record).sort()) {
      sorted[key] = record[key];
    }
    return sorted;
  }

  /**
   * Renders a Kubernetes manifest object as a YAML document.
   *
   * @throws {ManifestValidationError} When the object cannot be serialized
   */
  static renderManifest(manifest: KubernetesManifest): string {
    try {
      return yamlStringify(manifest, {
        indent: 2,
        lineWidth: 0,
      });
    } catch (error) {
      Logger.error(`Failed to render manifest for ${manifest.kind}/${manifest.metadata.name}: ${errorMessage(error)}`);
      throw new ManifestValidationError(`YAML rendering failed: ${errorMessage(error)}`, {
        kind: manifest.kind,
        name: manifest.metadata.name,
      });
    }
  }

  /**
   * Validates that required fields are present and well formed.
   *
   * @throws {ManifestValidationError} If required fields are missing or invalid
   */
  static validateManifest(manifest: KubernetesManifest | SecretManifest): void {
    if (!manifest.apiVersion) {
      throw new ManifestValidationError('Manifest missing required field: apiVersion');
    }

    if (!manifest.kind) {
      throw new ManifestValidationError('Manifest missing required field: kind');
    }

    if (!manifest.metadata.name) {
      throw new ManifestValidationError('Manifest missing required field: metadata.name', { kind: manifest.kind });
    }

    if (!this.validateResourceName(manifest.metadata.name)) {
      throw new ManifestValidationError(`Invalid resource name: ${manifest.metadata.name}`, { kind: manifest.kind });
    }

    if (manifest.metadata.namespace && !this.validateNamespace(manifest.metadata.namespace)) {
      throw new ManifestValidationError(`Invalid namespace name: ${manifest.metadata.namespace}`, { kind: manifest.kind });
    }

    if (manifest.kind === 'Service' && !this.validateServiceName(manifest.metadata.name)) {
      throw new ManifestValidationError(`Invalid Service name: ${manifest.metadata.name}`, { kind: manifest.kind });
    }

    if (isSecretManifest(manifest)) {
      for (const key of Object.keys(manifest.data)) {
        if (!this.validateDataKey(key)) {
          throw new ManifestValidationError(`Invalid Secret data key: ${key}`, { kind: manifest.kind });
        }
      }
    }

    for (const [key, value] of Object.entries(manifest.metadata.labels ?? {})) {
      if (!this.validateLabelValue(value)) {
        throw new ManifestValidationError(`Invalid value for label ${key}: ${value}`, { kind: manifest.kind });
      }
    }
  }
}
