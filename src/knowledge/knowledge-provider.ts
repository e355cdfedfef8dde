import fs from 'node:fs/promises';
import path from 'node:path';
import cron, { type ScheduledTask } from 'node-cron';
import { KnowledgeUnavailable, ReloadFailed } from '../core/errors';
import { logger, errorMessage } from '../observability/logger';
import type { KnowledgeSnapshot, KnowledgeSource } from './types';

type KnowledgeProviderOpts = {
  source: KnowledgeSource;
  /** Last good document is mirrored here and used when the source is down at start-up. */
  cachePath?: string;
  clock?: () => Date;
};

/**
 * Sole owner of the knowledge snapshot. Readers get an immutable object; a
 * reload swaps the reference in one assignment, so a reader sees either the
 * old or the new document.
 */
export class KnowledgeProvider {
  private source: KnowledgeSource;
  private cachePath?: string;
  private clock: () => Date;
  private snapshot: KnowledgeSnapshot | null = null;
  private version = 0;
  private inflight: Promise<KnowledgeSnapshot> | null = null;
  private task: ScheduledTask | null = null;

  constructor(opts: KnowledgeProviderOpts) {
    this.source = opts.source;
    this.cachePath = opts.cachePath;
    this.clock = opts.clock ?? (() => new Date());
  }

  currentSnapshot(): KnowledgeSnapshot {
    if (!this.snapshot) {
      throw new KnowledgeUnavailable('knowledge document has not been loaded');
    }
    return this.snapshot;
  }

  /** Concurrent callers share the fetch already in flight. */
  reload(): Promise<KnowledgeSnapshot> {
    if (!this.inflight) {
      this.inflight = this.fetchAndSwap().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** First load: the source, else the cache file, else stay empty. */
  async init(): Promise<KnowledgeSnapshot | null> {
    try {
      return await this.reload();
    } catch (err) {
      logger.warn('knowledge source unavailable at start-up', { source: this.source.name, error: errorMessage(err) });
    }
    const cached = await this.readCache();
    if (cached === null) {
      logger.warn('no cached knowledge document found');
      return null;
    }
    return this.swap(cached, 'cache');
  }

  startSchedule(expression: string) {
    if (!cron.validate(expression)) {
      throw new Error(`invalid knowledge refresh schedule: ${expression}`);
    }
    this.stopSchedule();
    this.task = cron.schedule(expression, () => {
      this.reload().catch((err: unknown) => {
        logger.warn('scheduled knowledge reload failed, keeping previous snapshot', { error: errorMessage(err) });
      });
    });
    logger.info('knowledge refresh scheduled', { expression });
  }

  stopSchedule() {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
  }

  private async fetchAndSwap(): Promise<KnowledgeSnapshot> {
    let content: string;
    try {
      content = await this.source.fetch();
    } catch (err) {
      logger.error('knowledge reload failed', { source: this.source.name, error: errorMessage(err) });
      throw new ReloadFailed(`could not fetch knowledge from ${this.source.name}`, { cause: err });
    }
    if (content.trim().length === 0) {
      logger.error('knowledge reload returned an empty document', { source: this.source.name });
      throw new ReloadFailed(`knowledge document from ${this.source.name} is empty`);
    }
    const snapshot = this.swap(content, 'source');
    await this.writeCache(content);
    return snapshot;
  }

  private swap(content: string, origin: KnowledgeSnapshot['origin']): KnowledgeSnapshot {
    this.version += 1;
    const next: KnowledgeSnapshot = Object.freeze({ content, version: this.version, loadedAt: this.clock(), origin });
    this.snapshot = next;
    logger.info('knowledge snapshot replaced', { version: next.version, chars: content.length, origin });
    return next;
  }

  private async readCache(): Promise<string | null> {
    if (!this.cachePath) return null;
    try {
      const text = await fs.readFile(this.cachePath, 'utf8');
      return text.trim().length > 0 ? text : null;
    } catch (err) {
      logger.debug('knowledge cache read failed', { path: this.cachePath, error: errorMessage(err) });
      return null;
    }
  }

  private async writeCache(content: string) {
    if (!this.cachePath) return;
    try {
      await fs.mkdir(path.dirname(this.cachePath), { recursive: true });
      await fs.writeFile(this.cachePath, content, 'utf8');
    } catch (err) {
      logger.warn('knowledge cache write failed', { path: this.cachePath, error: errorMessage(err) });
    }
  }
}
