export { default as Board } from './lib/Board.js';
export type { BoardOptions } from './lib/Board.js';
export { default as Catalog } from './lib/Catalog.js';
export type { Page } from './lib/Catalog.js';
export { default as Thread } from './lib/Thread.js';
export { default as ThreadCache } from './lib/ThreadCache.js';
export { default as Client, ClientError } from './lib/utils/Client.js';
export type { ChanClient, ClientResponse } from './lib/utils/Client.js';
export { getClientConfig } from './lib/ClientOptions.js';
export type { ClientOptions, ClientConfig } from './lib/ClientOptions.js';
export { PostSchema, ThreadDataSchema, isPostMatch } from './lib/entities/Post.js';
export type { Post, ThreadData } from './lib/entities/Post.js';
export { InvalidBoardNameError, InvalidQueryError, UnexpectedResponseError } from './lib/Errors.js';
export { formatHTTPDate, ifModifiedSince } from './lib/utils/Misc.js';
export type { ConditionalHeader } from './lib/utils/Misc.js';
export { compileQuery } from './lib/utils/Query.js';
export { default as Logger, commonLog } from './lib/utils/logging/Logger.js';
export type { LogEntry, LogLevel } from './lib/utils/logging/Logger.js';
export { default as ConsoleLogger } from './lib/utils/logging/ConsoleLogger.js';
export type { ConsoleLoggerOptions } from './lib/utils/logging/ConsoleLogger.js';
