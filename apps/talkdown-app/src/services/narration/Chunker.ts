import { narrationLogger } from './logger';
import { ContentSection, InterjectionEvent, Utterance } from './types';
import { createUtterance } from './utterance';

export interface ChunkingOptions {
  targetChunkSize: number;
  maxChunkSize: number;
}

const DEFAULT_OPTIONS: ChunkingOptions = {
  targetChunkSize: 200,
  maxChunkSize: 300,
};

const BREAK_SEARCH_RANGE = 50;
const TERMINAL_PUNCTUATION = '.!?…';
const CLOSING_MARKS = `"'”’)]`;
const FENCE_PATTERN = /^\s*(?:`{3,}|~{3,})\s*([^\s`{}]+)?/;

const isSpace = (ch: string) => ch !== '' && /\s/.test(ch);

/**
 * Returns the language tag of a fenced code marker, lower-cased, or null
 * when the fence carries none. Symbols are kept (`c++`, `c#`).
 */
export function extractCodeLanguage(fence: string | undefined): string | null {
  if (!fence) return null;
  const match = fence.match(FENCE_PATTERN);
  const language = match?.[1];
  return language ? language.toLowerCase() : null;
}

/**
 * Sorts sections, clamps them to the text and drops empty or inverted
 * ranges. An unterminated technical block swallows the rest of the text.
 */
export function normalizeSections(sections: ContentSection[], textLength: number): ContentSection[] {
  const clamp = (n: number) => Math.max(0, Math.min(textLength, Math.floor(n)));
  const sorted = sections
    .map((s) => ({ ...s, startIndex: clamp(s.startIndex), endIndex: clamp(s.endIndex) }))
    .sort((a, b) => a.startIndex - b.startIndex);

  const result: ContentSection[] = [];
  let previousEnd = 0;
  for (const section of sorted) {
    const startIndex = Math.max(section.startIndex, previousEnd);
    let endIndex = section.endIndex;
    if (section.skippable && section.terminated === false) {
      endIndex = textLength;
    }
    if (endIndex <= startIndex) continue;
    result.push({ ...section, startIndex, endIndex });
    previousEnd = endIndex;
  }

  if (result.length < sections.length) {
    narrationLogger.chunker.dropped(sections.length - result.length);
  }
  return result;
}

/**
 * End of the sentence that starts at or after `from`: just past the
 * terminal punctuation, closing quotes and trailing whitespace, or `limit`.
 * A blank line also ends a sentence.
 */
export function findSentenceEnd(text: string, from: number, limit: number): number {
  let i = from;
  while (i < limit) {
    const ch = text.charAt(i);
    if (TERMINAL_PUNCTUATION.includes(ch)) {
      let j = i + 1;
      while (j < limit && TERMINAL_PUNCTUATION.includes(text.charAt(j))) j++;
      while (j < limit && CLOSING_MARKS.includes(text.charAt(j))) j++;
      if (j >= limit) return limit;
      if (isSpace(text.charAt(j))) {
        while (j < limit && isSpace(text.charAt(j))) j++;
        return j;
      }
      // "3.14", "e.g.x" and the like
      i = j;
      continue;
    }
    if (ch === '\n' && text.charAt(i + 1) === '\n') {
      let j = i;
      while (j < limit && isSpace(text.charAt(j))) j++;
      return j;
    }
    i++;
  }
  return limit;
}

function findBreakPoint(text: string, from: number, targetPos: number): number {
  const searchStart = Math.max(from + 1, targetPos - BREAK_SEARCH_RANGE);
  const searchText = text.slice(searchStart, targetPos);

  const clauseBreak = Math.max(
    searchText.lastIndexOf(', '),
    searchText.lastIndexOf('; '),
    searchText.lastIndexOf(': '),
  );
  if (clauseBreak !== -1 && clauseBreak > searchText.length / 2) return searchStart + clauseBreak + 2;

  const wordBreak = searchText.lastIndexOf(' ');
  if (wordBreak !== -1) return searchStart + wordBreak + 1;

  return targetPos;
}

const normalizeSpeech = (text: string) => text.replace(/\s+/g, ' ').trim();

/**
 * Turns typed sections into utterances on demand. Holds no mutable state:
 * every call is answered from the text and the section list alone.
 */
export class Chunker {
  readonly sections: readonly ContentSection[];
  #text: string;
  #options: ChunkingOptions;

  constructor(text: string, sections: ContentSection[], options?: Partial<ChunkingOptions>) {
    this.#text = text;
    this.#options = { ...DEFAULT_OPTIONS, ...options };
    this.sections = normalizeSections(sections, text.length);
    narrationLogger.chunker.load(this.sections.length, text.length);
  }

  get textLength(): number {
    return this.#text.length;
  }

  /**
   * Index of the first section ending after `position` (the section that
   * contains it, or the next one when it falls in a gap); -1 past the end.
   */
  sectionIndexAt(position: number): number {
    let left = 0;
    let right = this.sections.length - 1;
    let result = -1;
    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      const section = this.sections[mid];
      if (section && section.endIndex > position) {
        result = mid;
        right = mid - 1;
      } else {
        left = mid + 1;
      }
    }
    return result;
  }

  nextUtterances(from: number, limit: number): Utterance[] {
    const utterances: Utterance[] = [];
    let cursor = Math.max(0, Math.min(this.#text.length, Math.floor(from)));
    let index = this.sectionIndexAt(cursor);
    if (index === -1) {
      narrationLogger.chunker.exhausted(cursor);
      return utterances;
    }

    while (utterances.length < limit && index < this.sections.length) {
      const section = this.sections[index];
      if (!section) break;
      const start = Math.max(cursor, section.startIndex);

      if (section.skippable) {
        utterances.push(this.#placeholder(section, index, start));
        cursor = section.endIndex;
        index++;
        continue;
      }

      const chunk = this.#nextChunk(section, index, start);
      if (!chunk) {
        cursor = section.endIndex;
        index++;
        continue;
      }
      utterances.push(chunk);
      cursor = chunk.endPosition;
      if (cursor >= section.endIndex) index++;
    }

    narrationLogger.chunker.batch(from, utterances.length);
    return utterances;
  }

  #nextChunk(section: ContentSection, sectionIndex: number, start: number): Utterance | null {
    const end = section.endIndex;
    let speechStart = start;
    while (speechStart < end && isSpace(this.#text.charAt(speechStart))) speechStart++;
    if (speechStart >= end) return null;

    const { targetChunkSize, maxChunkSize } = this.#options;
    let chunkEnd = speechStart;

    while (chunkEnd < end) {
      const sentenceEnd = findSentenceEnd(this.#text, chunkEnd, end);
      const length = sentenceEnd - speechStart;

      if (chunkEnd === speechStart) {
        // first sentence always goes in, split at a word break when oversized
        chunkEnd =
          length > maxChunkSize
            ? findBreakPoint(this.#text, speechStart, speechStart + maxChunkSize)
            : sentenceEnd;
        if (chunkEnd - speechStart >= targetChunkSize) break;
        continue;
      }

      if (length > targetChunkSize) break;
      chunkEnd = sentenceEnd;
    }

    const text = normalizeSpeech(this.#text.slice(speechStart, chunkEnd));
    return createUtterance({
      text,
      startPosition: start,
      endPosition: chunkEnd,
      sectionIndex,
      metadata: {
        contentKind: section.kind,
        isSkippable: false,
        pendingAnnouncements: [],
      },
    });
  }

  #placeholder(section: ContentSection, sectionIndex: number, start: number): Utterance {
    const language = this.#languageOf(section);
    const events: InterjectionEvent[] = [
      { type: 'codeBlockStart', language, sectionIndex },
      { type: 'codeBlockEnd', sectionIndex },
    ];
    return createUtterance({
      text: language ? `[${language} code]` : '[code]',
      startPosition: start,
      endPosition: section.endIndex,
      sectionIndex,
      metadata: {
        contentKind: section.kind,
        language: language ?? undefined,
        isSkippable: true,
        pendingAnnouncements: events,
      },
    });
  }

  #languageOf(section: ContentSection): string | null {
    if (section.fence !== undefined) return extractCodeLanguage(section.fence);
    const firstLine = this.#text.slice(section.startIndex, section.endIndex).split('\n', 1)[0];
    return extractCodeLanguage(firstLine);
  }
}
