/**
 * Persistent memory journal types
 * One NamespaceDocument is stored per namespace as <namespace>.json
 */
import { z } from 'zod';

export const EntrySchema = z.object({
  timestamp: z.string(),
  data: z.record(z.unknown()),
});

// Entries already on disk are kept as they are, including keys this service never writes
export const StoredEntrySchema = z
  .object({
    timestamp: z.unknown().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

export const NamespaceDocumentSchema = z
  .object({
    updated_at: z.string().catch(() => utcNowIso()),
    entries: z.array(StoredEntrySchema),
  })
  .passthrough();

export type Entry = z.infer<typeof EntrySchema>;
export type StoredEntry = z.infer<typeof StoredEntrySchema>;
export type NamespaceDocument = z.infer<typeof NamespaceDocumentSchema>;

export interface MemorySnapshot {
  updated_at: string;
  entries: StoredEntry[];
}

export type WriteMode = 'append' | 'replace' | 'clear';

export interface WriteRejected {
  rejected: true;
  reason: 'WriteDisabled';
  message: string;
}

export type WriteResult = NamespaceDocument | WriteRejected;

export function isWriteRejected(result: WriteResult): result is WriteRejected {
  return 'rejected' in result && result.rejected === true && result.reason === 'WriteDisabled';
}

/**
 * UTC ISO-8601 at second precision, e.g. 2026-01-02T03:04:05Z
 */
export function utcNowIso(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
}
