import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from 'pino';
import { NamespaceDocumentSchema, utcNowIso } from '../models/memory.js';
import type { NamespaceDocument } from '../models/memory.js';

export const DEFAULT_NAMESPACE = 'default';

/**
 * Restrict namespace names to [A-Za-z0-9_.-] so they cannot escape the store directory
 */
export function sanitizeNamespace(namespace: string | undefined): string {
  const trimmed = (namespace ?? '').trim();
  // Names made only of dots would give hidden files such as "..json"
  if (!/[a-zA-Z0-9_.-]/.test(trimmed) || /^\.+$/.test(trimmed)) {
    return DEFAULT_NAMESPACE;
  }
  return trimmed.replace(/[^a-zA-Z0-9_.-]+/g, '_');
}

function emptyDocument(): NamespaceDocument {
  return { updated_at: utcNowIso(), entries: [] };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class NamespaceStore {
  private dir: string;
  private logger: Logger;

  constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  pathFor(namespace: string): string {
    return join(this.dir, `${sanitizeNamespace(namespace)}.json`);
  }

  /**
   * Never rejects: a missing, unreadable or corrupt file yields an empty document
   */
  async load(namespace: string): Promise<NamespaceDocument> {
    const path = this.pathFor(namespace);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) {
        this.logger.warn({ err, path }, 'Failed to read memory namespace, starting fresh');
      }
      return emptyDocument();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      this.logger.warn({ err, path }, 'Memory namespace is not valid JSON, starting fresh');
      return emptyDocument();
    }

    const result = NamespaceDocumentSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn({ path, issues: result.error.issues.length }, 'Memory namespace has an unexpected shape, starting fresh');
      return emptyDocument();
    }

    return result.data;
  }

  /**
   * Write to a per-process temp file, then rename over the target so readers
   * never see a partial document
   */
  async save(namespace: string, doc: NamespaceDocument): Promise<void> {
    const path = this.pathFor(namespace);
    const tempPath = `${path}.tmp-${process.pid}`;

    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }

    this.logger.debug({ path, entries: doc.entries.length }, 'Memory namespace saved');
  }
}
