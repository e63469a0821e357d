import Logger from './utils/logging/Logger.js';
import { DeepRequired, pickDefined } from './utils/Misc.js';

export interface ClientOptions {
  apiBaseURL?: string;
  // Valid board names. When omitted, `Client.getInstance()` loads them from the API.
  boards?: string[] | null;
  request?: {
    maxRetries?: number;
    retryInterval?: number;
    maxConcurrent?: number;
    // Minimum time between two requests (ms)
    minTime?: number;
    userAgent?: string;
  };
  logger?: Logger | null;
}

export type ClientConfig = DeepRequired<Omit<ClientOptions, 'logger'>>;

const USER_AGENT = 'imageboard-cache/1.0 (+https://www.npmjs.com/package/imageboard-cache)';

const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  apiBaseURL: 'https://a.4cdn.org',
  boards: null,
  request: {
    maxRetries: 3,
    retryInterval: 1000,
    maxConcurrent: 1,
    minTime: 1000,
    userAgent: USER_AGENT
  }
};

export function getClientConfig(options?: ClientOptions): ClientConfig {
  const defaults = DEFAULT_CLIENT_CONFIG;
  return {
    apiBaseURL: pickDefined(options?.apiBaseURL, defaults.apiBaseURL),
    boards: options?.boards ? [ ...options.boards ] : defaults.boards,
    request: {
      maxRetries: pickDefined(options?.request?.maxRetries, defaults.request.maxRetries),
      retryInterval: pickDefined(options?.request?.retryInterval, defaults.request.retryInterval),
      maxConcurrent: pickDefined(options?.request?.maxConcurrent, defaults.request.maxConcurrent),
      minTime: pickDefined(options?.request?.minTime, defaults.request.minTime),
      userAgent: pickDefined(options?.request?.userAgent, defaults.request.userAgent)
    }
  };
}
