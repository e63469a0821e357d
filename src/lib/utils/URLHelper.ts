import { URL } from 'url';

export default class URLHelper {

  static getBoardListURL(apiBaseURL: string) {
    return this.#resolve(apiBaseURL, 'boards.json');
  }

  static getCatalogURL(apiBaseURL: string, board: string) {
    return this.#resolve(apiBaseURL, `${encodeURIComponent(board)}/catalog.json`);
  }

  static getThreadURL(apiBaseURL: string, board: string, threadNo: number) {
    return this.#resolve(apiBaseURL, `${encodeURIComponent(board)}/thread/${threadNo}.json`);
  }

  static #resolve(apiBaseURL: string, path: string) {
    let base: URL;
    try {
      base = new URL(apiBaseURL.endsWith('/') ? apiBaseURL : `${apiBaseURL}/`);
    }
    catch (error) {
      throw Error(`Invalid API base URL "${apiBaseURL}"`, { cause: error });
    }
    return new URL(path, base).toString();
  }
}
