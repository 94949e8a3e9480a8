import type { Logger } from 'pino';
import { utcNowIso } from '../models/memory.js';
import type {
  Entry,
  MemorySnapshot,
  StoredEntry,
  NamespaceDocument,
  WriteMode,
  WriteResult,
} from '../models/memory.js';
import { NamespaceStore, sanitizeNamespace } from './store.js';

export { NamespaceStore, sanitizeNamespace, DEFAULT_NAMESPACE } from './store.js';

export interface MemoryPolicy {
  readOnly: boolean;
  writeEnabled: boolean;
}

export const WRITE_DISABLED_MESSAGE = 'Error: read-only mode is enabled. Writes are disabled.';

const WRITE_MODES: readonly WriteMode[] = ['append', 'replace', 'clear'];

function isWriteMode(value: string): value is WriteMode {
  return WRITE_MODES.some((mode) => mode === value);
}

/**
 * Unrecognized or missing modes fall back to append
 */
export function parseWriteMode(input: string | undefined): WriteMode {
  const normalized = (input ?? '').trim().toLowerCase();
  return isWriteMode(normalized) ? normalized : 'append';
}

/**
 * Writes are only refused when read-only is on and the memory override is off
 */
export function isWriteAllowed(policy: MemoryPolicy): boolean {
  return !(policy.readOnly && !policy.writeEnabled);
}

export class MemoryService {
  private store: NamespaceStore;
  private policy: MemoryPolicy;
  private logger: Logger;
  // Tail of the pending write chain per sanitized namespace
  private pending = new Map<string, Promise<void>>();

  constructor(store: NamespaceStore, policy: MemoryPolicy, logger: Logger) {
    this.store = store;
    this.policy = policy;
    this.logger = logger;
  }

  async get(namespace: string, limit?: number): Promise<MemorySnapshot> {
    const doc = await this.store.load(namespace);
    let entries = doc.entries;

    if (limit !== undefined) {
      const keep = Math.max(limit, 0);
      entries = keep === 0 ? [] : entries.slice(-keep);
    }

    return { updated_at: doc.updated_at, entries };
  }

  async write(
    namespace: string,
    data: Record<string, unknown> | undefined,
    mode: WriteMode
  ): Promise<WriteResult> {
    if (!isWriteAllowed(this.policy)) {
      this.logger.warn({ namespace: sanitizeNamespace(namespace), mode }, 'Memory write rejected, writes disabled');
      return { rejected: true, reason: 'WriteDisabled', message: WRITE_DISABLED_MESSAGE };
    }

    return this.serialize(sanitizeNamespace(namespace), async () => {
      const current = await this.store.load(namespace);
      const timestamp = utcNowIso();
      const entry: Entry = { timestamp, data: data ?? {} };

      let entries: StoredEntry[];
      switch (mode) {
        case 'clear':
          entries = [];
          break;
        case 'replace':
          entries = [entry];
          break;
        default:
          entries = [...current.entries, entry];
          break;
      }

      // Keys other than updated_at and entries survive the rewrite
      const updated: NamespaceDocument = { ...current, updated_at: timestamp, entries };
      await this.store.save(namespace, updated);

      this.logger.info(
        { namespace: sanitizeNamespace(namespace), mode, entries: entries.length },
        'Memory namespace updated'
      );
      return updated;
    });
  }

  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail settles either way so one failed write does not block the next
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.pending.get(key) === tail) {
          this.pending.delete(key);
        }
      });
    this.pending.set(key, tail);
    return run;
  }
}
