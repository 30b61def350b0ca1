import { Token, ClassDec, JackError } from '../types';
import { Result, attempt } from '../common/result';
import { Parser } from './parser';

export { Parser };

/**
 * Parses the first class in `tokens`, reporting the first invalid
 * production as an `Err` instead of throwing.
 */
export const parseTokens = (tokens: Token[]): Result<ClassDec, JackError> =>
  attempt(() => new Parser(tokens).parse(), JackError);
