/**
 * AI Configuration Index
 *
 * Model selection for every language-model agent.
 *
 * @example
 * import { getModel } from '../config';
 * const model = getModel('KEYWORD_MINING');
 */

export * from './utils';
