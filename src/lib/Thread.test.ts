import { describe, it, expect, vi, afterEach } from 'vitest';
import Thread from './Thread.js';
import FakeClient from './utils/testing/FakeClient.js';
import { UnexpectedResponseError } from './Errors.js';
import { compileQuery } from './utils/Query.js';

const THREAD_URL = 'https://api.test/g/thread/10.json';

describe('Thread', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('is seeded from a catalog topic with its preview replies', () => {
    const client = new FakeClient();
    const thread = Thread.fromTopic({ no: 10, sub: 'hello', last_replies: [ { no: 11, com: 'first' } ] }, 'g', client);
    expect(thread.no).toBe(10);
    expect(thread.topic).toEqual({ no: 10, sub: 'hello' });
    expect(thread.replies).toEqual([ { no: 11, com: 'first' } ]);
    expect(thread.expired).toBe(false);
    expect(thread.lastModified).toBeNull();
    expect(thread.url).toBe(THREAD_URL);
  });

  it('is built from full thread data', () => {
    const thread = Thread.fromData({ posts: [ { no: 10 }, { no: 11 }, { no: 12 } ] }, 'g', new FakeClient());
    expect(thread.topic).toEqual({ no: 10 });
    expect(thread.replies.map((post) => post.no)).toEqual([ 11, 12 ]);
    expect(thread.lastModified).toBeInstanceOf(Date);
    expect(thread.expired).toBe(false);
  });

  it('is expired when built from an archived thread', () => {
    const thread = Thread.fromData({ posts: [ { no: 10, archived: 1 }, { no: 11 } ] }, 'g', new FakeClient());
    expect(thread.expired).toBe(true);
  });

  it('updates from the API, then revalidates conditionally', async () => {
    vi.useFakeTimers({ toFake: [ 'Date' ] });
    vi.setSystemTime(new Date('2024-03-01T08:05:09Z'));
    const client = new FakeClient().reply(THREAD_URL,
      { status: 200, body: { posts: [ { no: 10, sub: 'hello' }, { no: 11 }, { no: 12 } ] } },
      { status: 304 }
    );
    const thread = Thread.fromTopic({ no: 10, sub: 'hello' }, 'g', client);

    await thread.update();
    expect(thread.replies.map((post) => post.no)).toEqual([ 11, 12 ]);
    expect(thread.lastModified).toEqual(new Date('2024-03-01T08:05:09Z'));

    vi.setSystemTime(new Date('2024-03-01T09:00:00Z'));
    await thread.update();
    expect(thread.replies).toHaveLength(2);
    expect(thread.lastModified).toEqual(new Date('2024-03-01T08:05:09Z'));

    expect(client.requests).toEqual([
      { url: THREAD_URL, condition: null },
      { url: THREAD_URL, condition: { name: 'If-Modified-Since', value: 'Fri, 01 Mar 2024 08:05:09 GMT' } }
    ]);
  });

  it('expires on 404 and is not fetched again', async () => {
    const client = new FakeClient().reply(THREAD_URL, { status: 404 });
    const thread = Thread.fromTopic({ no: 10 }, 'g', client);
    await thread.update();
    expect(thread.expired).toBe(true);
    expect(client.unreadBodies).toBe(0);
    await thread.update();
    expect(client.requests).toHaveLength(1);
  });

  it('expires when the topic is archived', async () => {
    const client = new FakeClient().reply(THREAD_URL, { status: 200, body: { posts: [ { no: 10, archived: 1 } ] } });
    const thread = Thread.fromTopic({ no: 10 }, 'g', client);
    await thread.update();
    expect(thread.expired).toBe(true);
  });

  it('fails on other statuses and stays unchanged', async () => {
    const client = new FakeClient().reply(THREAD_URL, { status: 500 });
    const thread = Thread.fromTopic({ no: 10, last_replies: [ { no: 11 } ] }, 'g', client);
    await expect(thread.update()).rejects.toBeInstanceOf(UnexpectedResponseError);
    expect(client.unreadBodies).toBe(0);
    expect(thread.replies).toEqual([ { no: 11 } ]);
    expect(thread.lastModified).toBeNull();
    expect(thread.expired).toBe(false);
  });

  it('stays unchanged when the body does not parse', async () => {
    const client = new FakeClient().reply(THREAD_URL, { status: 200, body: { posts: [] } });
    const thread = Thread.fromTopic({ no: 10 }, 'g', client);
    await expect(thread.update()).rejects.toThrow();
    expect(thread.lastModified).toBeNull();
    expect(thread.topic).toEqual({ no: 10 });
  });

  it('matches on its topic', () => {
    const thread = Thread.fromTopic({ no: 10, com: 'Rust or Go?', last_replies: [ { no: 11, com: 'zig' } ] }, 'g', new FakeClient());
    expect(thread.isMatch(compileQuery('rust'))).toBe(true);
    expect(thread.isMatch(compileQuery('zig'))).toBe(false);
  });

  it('clones into an independent snapshot', () => {
    const thread = Thread.fromData({ posts: [ { no: 10, sub: 'hello' }, { no: 11 } ] }, 'g', new FakeClient());
    const copy = thread.clone();
    expect(copy).toEqual(thread);
    expect(copy).not.toBe(thread);

    copy.topic.sub = 'changed';
    copy.replies.push({ no: 12 });
    copy.expired = true;
    expect(thread.topic.sub).toBe('hello');
    expect(thread.replies).toHaveLength(1);
    expect(thread.expired).toBe(false);
  });
});
