import * as path from 'node:path';
import chokidar from 'chokidar';
import { logger } from '../utils/index.js';
import { isCardFile, isHiddenPath } from './file-layout.js';

export interface ContactsWatcherOptions {
  directory?: string;
  listFile?: string;
  /** Quiet period before a burst of file events turns into one reload. */
  debounceMs?: number;
  onChange: () => void;
}

const DEFAULT_DEBOUNCE_MS = 250;

export type WatchEvent = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

/** Watch the contacts directory and list file, coalescing changes into reload requests. */
export class ContactsWatcher {
  private options: ContactsWatcherOptions;
  private watcher: ReturnType<typeof chokidar.watch> | null = null;
  private timer: NodeJS.Timeout | undefined;

  constructor(options: ContactsWatcherOptions) {
    this.options = options;
  }

  /** Begin watching; resolves once the initial scan is done and events are live. */
  start(): Promise<void> {
    const { directory, listFile } = this.options;
    const paths = [directory, listFile].filter((p): p is string => Boolean(p));
    if (paths.length === 0 || this.watcher) return Promise.resolve();

    const watcher = chokidar.watch(paths, {
      ignoreInitial: true,
      ignored: (p: string) => this.isIgnored(p),
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });
    this.watcher = watcher;
    watcher.on('all', (event: WatchEvent, filePath: string) => this.handleEvent(event, filePath));
    watcher.on('error', (err: unknown) => logger.warn('Contacts watcher error:', err));
    logger.debug('Watching', paths.join(', '));
    return new Promise(resolve => {
      watcher.once('ready', () => resolve());
    });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  /** Schedule a reload when `filePath` is a card file, the list file, or a whole directory. */
  handleEvent(event: WatchEvent, filePath: string): void {
    if (!this.isRelevant(event, filePath)) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.options.onChange();
    }, this.options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
  }

  /**
   * Hidden entries are skipped only below the contacts directory. The list file and the
   * directory holding it are always watched, wherever they live.
   */
  private isIgnored(filePath: string): boolean {
    const { listFile } = this.options;
    const resolved = path.resolve(filePath);
    if (listFile) {
      const list = path.resolve(listFile);
      if (resolved === list || resolved === path.dirname(list)) return false;
    }
    const relative = this.relativeToDirectory(resolved);
    return relative !== undefined && isHiddenPath(relative);
  }

  private isRelevant(event: WatchEvent, filePath: string): boolean {
    const { listFile } = this.options;
    if (listFile && path.resolve(filePath) === path.resolve(listFile)) return true;
    const relative = this.relativeToDirectory(path.resolve(filePath));
    if (relative === undefined || isHiddenPath(relative)) return false;
    // Adding or removing a directory moves every card below it without per-file events.
    return event === 'addDir' || event === 'unlinkDir' || isCardFile(filePath);
  }

  /** Path below the contacts directory, or undefined outside it. */
  private relativeToDirectory(resolved: string): string | undefined {
    const { directory } = this.options;
    if (!directory) return undefined;
    const relative = path.relative(path.resolve(directory), resolved);
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) return undefined;
    return relative;
  }
}
