import { InvalidQueryError } from '../Errors.js';

/**
 * Compiles a search query into a case-insensitive, Unicode-aware pattern.
 * The pattern is stateless (no `g` flag), so it can be tested against many
 * strings in a row.
 */
export function compileQuery(query: string): RegExp {
  try {
    return new RegExp(query, 'iu');
  }
  catch (error) {
    throw new InvalidQueryError(query, error);
  }
}
