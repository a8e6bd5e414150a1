/**
 * @fileoverview Shared type definitions.
 */

export type * from './workload-types.ts';
