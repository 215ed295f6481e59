/**
 * Reading classification lists from disk.
 */

import { readFileSync } from 'node:fs';
import { ClassificationReadError } from '../errors.js';
import type { ClassificationList } from '../types.js';
import { parseClassificationList } from './parser.js';

/**
 * Read and parse a `.pcl` or `.acl` file. The whole file is read before
 * parsing starts.
 */
export function readClassificationList(path: string): ClassificationList {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ClassificationReadError(path, e);
  }
  return parseClassificationList(content);
}
