import Thread from './Thread.js';

/**
 * In-memory store of threads keyed by thread number. Every method completes
 * synchronously, so no other caller can observe the cache half-way through one.
 * Sequences of calls spanning an `await` are not atomic.
 */
export default class ThreadCache {

  #threads: Map<number, Thread>;

  constructor() {
    this.#threads = new Map();
  }

  // Replaces any entry with the same thread number
  insert(thread: Thread) {
    this.#threads.set(thread.no, thread);
  }

  contains(threadNo: number) {
    return this.#threads.has(threadNo);
  }

  get(threadNo: number): Thread | undefined {
    return this.#threads.get(threadNo);
  }

  remove(threadNo: number) {
    return this.#threads.delete(threadNo);
  }

  values() {
    return [ ...this.#threads.values() ];
  }

  get size() {
    return this.#threads.size;
  }
}
