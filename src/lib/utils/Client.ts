import fetch, { Request } from 'node-fetch';
import Bottleneck from 'bottleneck';
import deepFreeze from 'deep-freeze';
import Logger, { LogLevel, commonLog } from './logging/Logger.js';
import { ConditionalHeader, sleepBeforeExecute } from './Misc.js';
import URLHelper from './URLHelper.js';
import { ClientConfig, ClientOptions, getClientConfig } from '../ClientOptions.js';
import { BoardListSchema } from '../entities/Post.js';
import { UnexpectedResponseError } from '../Errors.js';

export class ClientError extends Error {

  url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'ClientError';
    this.url = url;
  }
}

export interface ClientResponse {
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * What a `Board` needs from the transport. Several boards may share one
 * client, and with it the client's rate limit.
 */
export interface ChanClient {
  readonly apiBaseURL: string;
  isValidBoard(name: string): boolean;
  get(url: string, condition?: ConditionalHeader | null): Promise<ClientResponse>;
}

export default class Client implements ChanClient {

  name = 'Client';

  #config: deepFreeze.DeepReadonly<ClientConfig>;
  #logger?: Logger | null;
  #limiter: Bottleneck;
  #boards: Set<string> | null;

  constructor(options?: ClientOptions) {
    const config = getClientConfig(options);
    this.#config = deepFreeze(config);
    this.#logger = options?.logger;
    this.#limiter = new Bottleneck({
      maxConcurrent: config.request.maxConcurrent,
      minTime: config.request.minTime
    });
    this.#boards = config.boards ? new Set(config.boards) : null;
  }

  /**
   * Creates a client and, unless `options.boards` is given, loads the list of
   * valid boards from the API.
   */
  static async getInstance(options?: ClientOptions) {
    const client = new Client(options);
    if (!client.#boards) {
      await client.loadBoards();
    }
    return client;
  }

  get apiBaseURL() {
    return this.#config.apiBaseURL;
  }

  getConfig() {
    return this.#config;
  }

  isValidBoard(name: string) {
    if (!this.#boards) {
      this.log('warn', `Board list not loaded - cannot validate "${name}"`);
      return false;
    }
    return this.#boards.has(name);
  }

  async loadBoards(): Promise<string[]> {
    const url = URLHelper.getBoardListURL(this.apiBaseURL);
    const res = await this.get(url);
    if (res.status !== 200) {
      await res.text();
      throw new UnexpectedResponseError(res.status, res.statusText, url);
    }
    const { boards } = BoardListSchema.parse(JSON.parse(await res.text()));
    this.#boards = new Set(boards.map((b) => b.board));
    this.log('info', `Loaded ${this.#boards.size} boards from "${url}"`);
    return [ ...this.#boards ];
  }

  /**
   * Issues a GET through the client's rate limiter. Network failures are
   * retried; HTTP statuses, whatever they are, are returned as is.
   */
  get(url: string, condition?: ConditionalHeader | null): Promise<ClientResponse> {
    return this.#limiter.schedule(() => this.#fetchWithRetry(url, condition ?? null));
  }

  async #fetchWithRetry(url: string, condition: ConditionalHeader | null, rt = 0): Promise<ClientResponse> {
    const { maxRetries, retryInterval } = this.#config.request;
    try {
      const request = new Request(url, { method: 'GET' });
      this.#setHeaders(request, condition);
      this.log('debug', `GET "${url}"${condition ? ` (${condition.name}: ${condition.value})` : ''}`);
      const res = await fetch(request);
      this.log('debug', `${res.status} - "${url}"`);
      return res;
    }
    catch (error) {
      if (rt < maxRetries) {
        this.log('error', `Error fetching "${url}" - will retry: `, error);
        return sleepBeforeExecute(() => this.#fetchWithRetry(url, condition, rt + 1), retryInterval);
      }
      const errMsg = error instanceof Error ? error.message : String(error);
      const retriedMsg = rt > 0 ? ` (retried ${rt} times)` : '';
      throw new ClientError(`${errMsg}${retriedMsg}`, url);
    }
  }

  #setHeaders(request: Request, condition: ConditionalHeader | null) {
    request.headers.set('User-Agent', this.#config.request.userAgent);
    request.headers.set('Accept', 'application/json');
    if (condition) {
      request.headers.set(condition.name, condition.value);
    }
  }

  protected log(level: LogLevel, ...msg: unknown[]) {
    commonLog(this.#logger, level, this.name, ...msg);
  }
}
