import { ChanClient } from './utils/Client.js';
import { Post, ThreadData, ThreadDataSchema, isPostMatch } from './entities/Post.js';
import { ifModifiedSince } from './utils/Misc.js';
import URLHelper from './utils/URLHelper.js';
import { UnexpectedResponseError } from './Errors.js';

/**
 * A thread on a board: its topic (the opening post) and the replies known so
 * far. A thread seeded from a catalog only carries the catalog's preview
 * replies until its first `update()`.
 */
export default class Thread {

  readonly board: string;
  topic: Post;
  replies: Post[];
  expired: boolean;
  // Local time of the last successful (200) fetch
  lastModified: Date | null;

  #client: ChanClient;

  protected constructor(board: string, client: ChanClient, topic: Post, replies: Post[], lastModified: Date | null) {
    this.board = board;
    this.#client = client;
    this.topic = topic;
    this.replies = replies;
    this.expired = false;
    this.lastModified = lastModified;
  }

  static fromTopic(topic: Post, board: string, client: ChanClient) {
    const { last_replies: lastReplies, ...rest } = topic;
    return new Thread(board, client, rest, lastReplies ? [ ...lastReplies ] : [], null);
  }

  static fromData(data: ThreadData, board: string, client: ChanClient) {
    const [ topic, ...replies ] = data.posts;
    const thread = new Thread(board, client, topic, replies, new Date());
    thread.expired = topic.archived === 1;
    return thread;
  }

  get no() {
    return this.topic.no;
  }

  get url() {
    return URLHelper.getThreadURL(this.#client.apiBaseURL, this.board, this.no);
  }

  /**
   * Revalidates the thread against the API. A 404, or a topic flagged as
   * archived, marks the thread expired; expired threads are not fetched again.
   */
  async update(): Promise<void> {
    if (this.expired) {
      return;
    }
    const url = this.url;
    const res = await this.#client.get(url, this.lastModified ? ifModifiedSince(this.lastModified) : null);
    switch (res.status) {
      case 200: {
        const lastModified = new Date();
        const data = ThreadDataSchema.parse(JSON.parse(await res.text()));
        const [ topic, ...replies ] = data.posts;
        this.topic = topic;
        this.replies = replies;
        this.lastModified = lastModified;
        this.expired = topic.archived === 1;
        return;
      }
      case 304:
        return;
      case 404:
        await res.text();
        this.expired = true;
        return;
      default:
        await res.text();
        throw new UnexpectedResponseError(res.status, res.statusText, url);
    }
  }

  isMatch(regex: RegExp) {
    return isPostMatch(this.topic, regex);
  }

  clone() {
    const copy = new Thread(
      this.board,
      this.#client,
      structuredClone(this.topic),
      structuredClone(this.replies),
      this.lastModified ? new Date(this.lastModified) : null
    );
    copy.expired = this.expired;
    return copy;
  }
}
