/**
 * Subtitle entry model
 *
 * Raw text keeps the ASS conventions: \N separates display lines, {\...} holds
 * override tags, \h is a hard space and \n a soft break. SRT markup such as
 * <i> is accepted as well.
 */

import type { SubtitleEntryData } from '../types/index.js';

/** Line-break marker inside raw text */
export const LINE_BREAK = '\\N';

const OVERRIDE_TAG_RE = /\{[^}]*\}/g;
const MARKUP_TAG_RE = /<\/?(?:i|b|u|s|font)(?:\s[^>]*)?>/gi;
const HARD_SPACE_RE = /\\h/g;
const BREAK_RE = /\\[nN]/g;

export class SubtitleEntry implements SubtitleEntryData {
  index: number;
  startTime: number;
  endTime: number;
  text: string;

  constructor(data: SubtitleEntryData) {
    this.index = data.index;
    this.startTime = data.startTime;
    this.endTime = data.endTime;
    this.text = data.text;
  }

  /**
   * Text without markup, line breaks rendered as newlines
   */
  get plaintext(): string {
    return this.text
      .replace(OVERRIDE_TAG_RE, '')
      .replace(MARKUP_TAG_RE, '')
      .replace(HARD_SPACE_RE, ' ')
      .replace(BREAK_RE, '\n');
  }

  /**
   * Newlines are written back as \N
   */
  set plaintext(value: string) {
    this.text = value.replace(/\r?\n/g, LINE_BREAK);
  }

  get duration(): number {
    return this.endTime - this.startTime;
  }

  /** Display lines of the raw text */
  get lines(): string[] {
    return this.text.split(LINE_BREAK);
  }

  set lines(value: string[]) {
    this.text = value.join(LINE_BREAK);
  }

  copy(overrides: Partial<SubtitleEntryData> = {}): SubtitleEntry {
    return new SubtitleEntry({ ...this.toJSON(), ...overrides });
  }

  toJSON(): SubtitleEntryData {
    return {
      index: this.index,
      startTime: this.startTime,
      endTime: this.endTime,
      text: this.text,
    };
  }

  static from(data: SubtitleEntryData): SubtitleEntry {
    return data instanceof SubtitleEntry ? data.copy() : new SubtitleEntry(data);
  }
}
