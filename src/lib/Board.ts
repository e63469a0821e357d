import Catalog from './Catalog.js';
import Thread from './Thread.js';
import ThreadCache from './ThreadCache.js';
import { ChanClient } from './utils/Client.js';
import { ThreadDataSchema } from './entities/Post.js';
import { ifModifiedSince } from './utils/Misc.js';
import { compileQuery } from './utils/Query.js';
import URLHelper from './utils/URLHelper.js';
import Logger, { LogLevel, commonLog } from './utils/logging/Logger.js';
import { InvalidBoardNameError, UnexpectedResponseError } from './Errors.js';

export interface BoardOptions {
  logger?: Logger | null;
}

/**
 * A board and its thread cache. `catalog()` seeds the cache; `getThread()` and
 * `findCached()` revalidate cached threads lazily, on access.
 *
 * Methods that await the client between cache reads are not atomic: another
 * caller may insert, update or remove entries in between.
 */
export default class Board {

  readonly name: string;
  readonly client: ChanClient;
  readonly threadCache: ThreadCache;

  // Local time of the last 200 catalog response, not the server's Last-Modified
  #catalogLastModified: Date | null;
  #logger?: Logger | null;

  constructor(client: ChanClient, name: string, options?: BoardOptions) {
    if (!client.isValidBoard(name)) {
      throw new InvalidBoardNameError(name);
    }
    this.name = name;
    this.client = client;
    this.threadCache = new ThreadCache();
    this.#catalogLastModified = null;
    this.#logger = options?.logger;
  }

  get catalogLastModified() {
    return this.#catalogLastModified;
  }

  /**
   * Fetches the board's catalog and upserts a thread into the cache for every
   * topic in it.
   *
   * @returns The catalog, or `null` if it has not changed since the last
   * successful fetch.
   */
  async catalog(): Promise<Catalog | null> {
    const url = URLHelper.getCatalogURL(this.client.apiBaseURL, this.name);
    const lastModified = this.#catalogLastModified;
    const res = await this.client.get(url, lastModified ? ifModifiedSince(lastModified) : null);

    switch (res.status) {
      case 200: {
        this.#catalogLastModified = new Date();
        const catalog = Catalog.parse(await res.text());
        const topics = catalog.topics();
        for (const topic of topics) {
          this.threadCache.insert(Thread.fromTopic(topic, this.name, this.client));
        }
        this.log('info', `Catalog updated: ${catalog.pages.length} pages, ${topics.length} threads (${this.threadCache.size} cached)`);
        return catalog;
      }
      case 304:
        this.log('debug', 'Catalog not modified');
        return null;
      default:
        await res.text();
        throw new UnexpectedResponseError(res.status, res.statusText, url);
    }
  }

  /**
   * Returns a snapshot of thread `threadNo`. A cached thread is updated first;
   * otherwise the thread is fetched and added to the cache.
   */
  async getThread(threadNo: number): Promise<Thread> {
    const cached = this.threadCache.get(threadNo);
    if (cached) {
      await cached.update();
      const current = this.threadCache.get(threadNo);
      if (current) {
        return current.clone();
      }
      this.log('debug', `Thread #${threadNo} left the cache during update - fetching`);
    }

    const url = URLHelper.getThreadURL(this.client.apiBaseURL, this.name, threadNo);
    const res = await this.client.get(url);
    if (res.status !== 200) {
      await res.text();
      throw new UnexpectedResponseError(res.status, res.statusText, url);
    }
    const data = ThreadDataSchema.parse(JSON.parse(await res.text()));
    const thread = Thread.fromData(data, this.name, this.client);
    this.threadCache.insert(thread);
    this.log('debug', `Cached thread #${thread.no}`);
    return thread.clone();
  }

  /**
   * Updates and returns every cached thread whose topic matches `query`.
   * Threads found to be expired are removed from the cache.
   */
  async findCached(query: string): Promise<Thread[]> {
    const regex = compileQuery(query);
    const matches = this.threadCache.values()
      .filter((thread) => thread.isMatch(regex))
      .map((thread) => thread.clone());

    const result: Thread[] = [];
    for (const thread of matches) {
      await thread.update();
      if (thread.expired) {
        this.threadCache.remove(thread.no);
        this.log('debug', `Removed expired thread #${thread.no}`);
        continue;
      }
      if (this.threadCache.contains(thread.no)) {
        this.threadCache.insert(thread.clone());
      }
      result.push(thread);
    }
    return result;
  }

  protected log(level: LogLevel, ...msg: unknown[]) {
    commonLog(this.#logger, level, `Board /${this.name}/`, ...msg);
  }
}
