/**
 * Identifier generation for domain records.
 *
 * IDs are prefixed UUIDs so the record type is visible in logs and URLs.
 */

import { randomUUID } from 'node:crypto';

/** New practice session ID, e.g. 'ps_8d3c...' */
export function generateSessionId(): string {
  return `ps_${randomUUID()}`;
}

/** New drill ID, e.g. 'drl_1f0a...' */
export function generateDrillId(): string {
  return `drl_${randomUUID()}`;
}

/** New custom drill template ID, e.g. 'tpl_c41e...' */
export function generateTemplateId(): string {
  return `tpl_${randomUUID()}`;
}
