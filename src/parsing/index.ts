export { readClassificationList } from './loader.js';
export type { ParserState } from './parser.js';
export { ClassificationListParser, parseClassificationList } from './parser.js';
