/**
 * File Progress Store
 *
 * All workflows share one JSON document:
 *   { "version": 1, "workflows": { "<name>": ProgressRecord } }
 *
 * Commit protocol:
 *   1. write the new document to a temp file in the same directory
 *   2. fsync the temp file
 *   3. copy the current document to `<path>.bak`
 *   4. rename the temp file over the document (atomic on POSIX)
 *
 * On open, an unreadable document falls back to the backup.
 */

import { copyFile, mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { systemClock, type Clock } from '../utils/clock.js';
import { KeyedLock } from './keyed-lock.js';
import { applyMutation } from './record.js';
import { PROGRESS_DOCUMENT_VERSION, ProgressDocumentSchema } from './schema.js';
import { ProgressStoreError, type ProgressStore } from './store.js';
import type { ProgressDocument, ProgressMutation, ProgressRecord } from './types.js';

const DOCUMENT_LOCK = 'document';

export class FileProgressStore implements ProgressStore {
  private path: string;
  private clock: Clock;
  private lock = new KeyedLock();
  private document: ProgressDocument | null = null;

  constructor(path: string, clock: Clock = systemClock) {
    this.path = path;
    this.clock = clock;
  }

  get backupPath(): string {
    return `${this.path}.bak`;
  }

  async open(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    const primary = await this.readDocument(this.path);
    if (primary.type === 'OK') {
      this.document = primary.document;
      return;
    }

    const backup = await this.readDocument(this.backupPath);
    if (backup.type === 'OK') {
      this.document = backup.document;
      return;
    }

    if (primary.type === 'MISSING' && backup.type === 'MISSING') {
      this.document = { version: PROGRESS_DOCUMENT_VERSION, workflows: {} };
      return;
    }

    const reason = primary.type === 'INVALID' ? primary.reason : backup.type === 'INVALID' ? backup.reason : 'missing';
    throw new ProgressStoreError(`Progress file ${this.path} and its backup are unreadable: ${reason}`);
  }

  async load(workflow: string): Promise<ProgressRecord | null> {
    const record = this.requireOpen().workflows[workflow];
    return record ? structuredClone(record) : null;
  }

  async loadAll(): Promise<ProgressRecord[]> {
    return Object.values(this.requireOpen().workflows)
      .map((record) => structuredClone(record))
      .sort((a, b) => a.workflow.localeCompare(b.workflow));
  }

  /**
   * Commits are serialized across workflows: they all rewrite the same file.
   */
  async commit(workflow: string, mutation: ProgressMutation): Promise<ProgressRecord> {
    return this.lock.run(DOCUMENT_LOCK, async () => {
      const document = this.requireOpen();
      const next = applyMutation(document.workflows[workflow] ?? null, workflow, mutation, this.clock.now());

      const nextDocument: ProgressDocument = {
        ...document,
        workflows: sortedByName({ ...document.workflows, [workflow]: next }),
      };

      await this.persist(nextDocument);
      this.document = nextDocument;
      return structuredClone(next);
    });
  }

  async close(): Promise<void> {
    // Wait for in-flight commits
    await this.lock.run(DOCUMENT_LOCK, async () => {
      this.document = null;
    });
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private requireOpen(): ProgressDocument {
    if (!this.document) {
      throw new ProgressStoreError(`Progress store not open: ${this.path}`);
    }
    return this.document;
  }

  private async readDocument(
    path: string
  ): Promise<{ type: 'OK'; document: ProgressDocument } | { type: 'MISSING' } | { type: 'INVALID'; reason: string }> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return { type: 'MISSING' };
      throw new ProgressStoreError(`Cannot read progress file ${path}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return { type: 'INVALID', reason: error instanceof Error ? error.message : String(error) };
    }

    const parsed = ProgressDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      return { type: 'INVALID', reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
    }
    return { type: 'OK', document: parsed.data };
  }

  private async persist(document: ProgressDocument): Promise<void> {
    const tmpPath = `${this.path}.${uuidv4()}.tmp`;
    const json = `${JSON.stringify(document, null, 2)}\n`;

    try {
      const handle = await open(tmpPath, 'w');
      try {
        await handle.writeFile(json, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      try {
        await copyFile(this.path, this.backupPath);
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }

      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new ProgressStoreError(`Failed to write progress file ${this.path}`, error);
    }
  }
}

function sortedByName(workflows: Record<string, ProgressRecord>): Record<string, ProgressRecord> {
  return Object.fromEntries(Object.entries(workflows).sort(([a], [b]) => a.localeCompare(b)));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
