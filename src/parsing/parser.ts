/**
 * Incremental parser for `.pcl` / `.acl` classification streams.
 *
 * A stream holds one `<CLASS>` block per subsample. Each block body is a
 * comma-separated list of patch labels ended by the next `<`:
 *
 * ```text
 * header lines are ignored
 * <CLASS>RBC,WBC,,BACT</CLASS>
 * <CLASS>SQEP,NONE,<CLASS>...
 * ```
 *
 * Empty tokens between commas become `NONE`. The `<` that ends a body only
 * emits the label in front of it, so `RBC,WBC,<` holds two patches and
 * `<CLASS><` none. Whitespace inside a body is skipped rather than kept as
 * part of a label (`RBC ,\n WBC` reads as `RBC`, `WBC`). The `<` that ends
 * a body is handed back to the tag scanner, so the next `<CLASS>` may follow
 * on the same line.
 */

import {
  type ClassificationList,
  createPatchClassification,
  NO_CLASSIFICATION,
  type PatchClassification,
} from '../types.js';

const CLASS_TAG = '<CLASS';
const TAG_END = '>';
const TAG_START = '<';
const DELIMITER = ',';

/**
 * - `line-start`: skipping leading whitespace of a line
 * - `tag`: matching the characters of `<CLASS`
 * - `discard-line`: dropping everything up to the next newline
 * - `body`: reading the labels of a subsample
 */
export type ParserState = 'line-start' | 'tag' | 'discard-line' | 'body';

export class ClassificationListParser {
  private state: ParserState = 'line-start';
  private tagLength = 0;
  private token = '';
  private current: PatchClassification[] = [];
  private readonly subsamples: PatchClassification[][] = [];
  private ended = false;

  /** Current scanner state, mostly useful for diagnostics. */
  get currentState(): ParserState {
    return this.state;
  }

  /** Number of `<CLASS>` blocks opened so far. */
  get subsampleCount(): number {
    return this.subsamples.length;
  }

  /**
   * Consume the next chunk of the stream. Chunks may split tags and labels
   * anywhere.
   */
  feed(chunk: string): this {
    if (this.ended) {
      throw new Error('Cannot feed a ClassificationListParser after end()');
    }
    for (const ch of chunk) {
      this.step(ch);
    }
    return this;
  }

  /**
   * Finish the stream and return the parsed list. A label that was still
   * waiting for its delimiter is dropped.
   */
  end(): ClassificationList {
    this.ended = true;
    this.token = '';
    return Object.freeze(this.subsamples.map((records) => Object.freeze([...records])));
  }

  private step(ch: string): void {
    switch (this.state) {
      case 'line-start':
        if (isWhitespace(ch)) return;
        if (ch === TAG_START) {
          this.state = 'tag';
          this.tagLength = 1;
        } else {
          this.state = 'discard-line';
        }
        return;

      case 'tag':
        if (this.tagLength === CLASS_TAG.length) {
          if (ch === TAG_END) {
            this.openSubsample();
          } else {
            this.abandonTag(ch);
          }
        } else if (ch === CLASS_TAG[this.tagLength]) {
          this.tagLength += 1;
        } else {
          this.abandonTag(ch);
        }
        return;

      case 'discard-line':
        if (ch === '\n') this.state = 'line-start';
        return;

      case 'body':
        if (isWhitespace(ch)) return;
        if (ch === DELIMITER) {
          this.emitToken();
        } else if (ch === TAG_START) {
          // A trailing comma has already emitted its patch.
          if (this.token.length > 0) {
            this.emitToken();
          }
          // Push the `<` back so it starts the next tag.
          this.state = 'line-start';
          this.step(ch);
        } else {
          this.token += ch;
        }
        return;
    }
  }

  private openSubsample(): void {
    this.current = [];
    this.subsamples.push(this.current);
    this.token = '';
    this.state = 'body';
  }

  private emitToken(): void {
    const label = this.token.length > 0 ? this.token : NO_CLASSIFICATION;
    this.current.push(
      createPatchClassification(this.subsamples.length, this.current.length, label),
    );
    this.token = '';
  }

  private abandonTag(ch: string): void {
    this.tagLength = 0;
    this.state = ch === '\n' ? 'line-start' : 'discard-line';
  }
}

/**
 * Parse a complete classification stream, given as one string or as a
 * sequence of chunks.
 */
export function parseClassificationList(source: string | Iterable<string>): ClassificationList {
  const parser = new ClassificationListParser();
  if (typeof source === 'string') {
    parser.feed(source);
  } else {
    for (const chunk of source) {
      parser.feed(chunk);
    }
  }
  return parser.end();
}

function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\v' || ch === '\f'
  );
}
