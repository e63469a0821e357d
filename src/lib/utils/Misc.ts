export type DeepRequired<T> = T extends object ? {
  [K in keyof T]-?: DeepRequired<T[K]>;
} : T;

export interface ConditionalHeader {
  name: 'If-Modified-Since';
  value: string;
}

export function pickDefined<T>(value1: T | undefined, value2: T): T {
  return value1 !== undefined ? value1 : value2;
}

export function sleepBeforeExecute<T>(callback: () => Promise<T>, ms: number): Promise<T> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  }).then(() => callback());
}

/**
 * Formats `date` as an HTTP-date in UTC, i.e. `%a, %d %b %Y %T GMT`
 * (e.g. `Sat, 29 Oct 1994 19:43:31 GMT`).
 */
export function formatHTTPDate(date: Date) {
  return date.toUTCString();
}

export function ifModifiedSince(date: Date): ConditionalHeader {
  return {
    name: 'If-Modified-Since',
    value: formatHTTPDate(date)
  };
}
