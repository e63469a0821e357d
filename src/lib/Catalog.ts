import { z } from 'zod';
import { Post, PostSchema, isPostMatch } from './entities/Post.js';
import { compileQuery } from './utils/Query.js';

export interface Page {
  page: number;
  // Topics (opening posts) of the threads on this page
  topics: Post[];
}

const PageSchema = z.object({
  page: z.number().int(),
  threads: z.array(PostSchema)
}).transform(({ page, threads }): Page => ({ page, topics: threads }));

const CatalogSchema = z.object({
  pages: z.array(PageSchema)
});

/**
 * Snapshot of every live thread on a board, grouped into pages. Holds topics
 * only; use `Board.getThread()` or `Board.findCached()` for full threads.
 */
export default class Catalog {

  readonly pages: Page[];

  constructor(pages: Page[]) {
    this.pages = pages;
  }

  /**
   * Parses the body of `/<board>/catalog.json`. The API serves a bare array of
   * pages, so it is wrapped as `{"pages": ...}` first.
   */
  static parse(body: string) {
    const data = CatalogSchema.parse(JSON.parse(`{"pages":${body}}`));
    return new Catalog(data.pages);
  }

  // Page order is kept; a thread listed on two pages appears twice
  topics(): Post[] {
    return this.pages.reduce<Post[]>((topics, page) => {
      topics.push(...page.topics);
      return topics;
    }, []);
  }

  /**
   * Topics whose name, comment, subject or filename match `query`
   * (case-insensitive). `null` when nothing matches.
   */
  find(query: string): Post[] | null {
    const regex = compileQuery(query);
    const topics = this.topics().filter((topic) => isPostMatch(topic, regex));
    if (topics.length === 0) {
      return null;
    }
    return topics;
  }
}
