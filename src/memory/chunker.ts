/**
 * Text Chunking for Embeddings
 *
 * Splits text on sentence and paragraph boundaries into segments of at most
 * `maxChunkSize` characters, falling back to a sliding character window for
 * sentences that are too long on their own. Adjacent segments share
 * `overlap` characters. Segments shorter than `minChunkSize` are merged into
 * a neighbour, never dropped, so short conversational turns stay retrievable.
 */

import { InvalidInputError } from "../errors.js";
import type { Chunk, ChunkSegment, Tenant } from "./types.js";

export type ChunkOptions = {
  /** Segments shorter than this are merged into a neighbour */
  minChunkSize: number;
  /**
   * Target upper bound for a segment, in UTF-16 code units. A merged segment
   * can exceed it by up to `minChunkSize`.
   */
  maxChunkSize: number;
  /** Characters shared between adjacent segments */
  overlap: number;
};

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  minChunkSize: 5,
  maxChunkSize: 512,
  overlap: 64,
};

type Range = { start: number; end: number };

// Sentence terminators (latin and CJK) plus trailing closers and spaces, or a line break run.
const BOUNDARY_RE = /[.!?。！？]+["'”’)\]]*[ \t]*|\n+/g;

export function validateChunkOptions(options: ChunkOptions): void {
  const { minChunkSize, maxChunkSize, overlap } = options;
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new InvalidInputError("maxChunkSize must be a positive integer", { maxChunkSize });
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
    throw new InvalidInputError("overlap must be in [0, maxChunkSize)", { overlap, maxChunkSize });
  }
  if (!Number.isInteger(minChunkSize) || minChunkSize < 0 || minChunkSize > maxChunkSize) {
    throw new InvalidInputError("minChunkSize must be in [0, maxChunkSize]", { minChunkSize, maxChunkSize });
  }
}

/**
 * Chunk text into overlapping segments.
 *
 * The result is lazy and restartable: nothing is computed until it is
 * iterated, and every iteration starts again from the beginning.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): Iterable<ChunkSegment> {
  const opts = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  validateChunkOptions(opts);
  return {
    [Symbol.iterator]: () => mergeShortSegments(text, slidingSegments(text, opts), opts.minChunkSize),
  };
}

/**
 * Split text into sentence ranges. Each range keeps its terminator.
 */
export function splitSentences(text: string): Range[] {
  const ranges: Range[] = [];
  let start = 0;
  for (const match of text.matchAll(BOUNDARY_RE)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > start) ranges.push({ start, end });
    start = end;
  }
  if (start < text.length) ranges.push({ start, end: text.length });
  return ranges;
}

function* slidingSegments(text: string, opts: ChunkOptions): Generator<ChunkSegment> {
  const { maxChunkSize, overlap } = opts;
  let window: Range | null = null;

  for (const sentence of splitSentences(text)) {
    const length = sentence.end - sentence.start;

    if (length > maxChunkSize) {
      if (window) {
        yield* emit(text, window);
        window = null;
      }
      let start = sentence.start;
      while (start < sentence.end) {
        let end = backToBoundary(text, Math.min(start + maxChunkSize, sentence.end));
        if (end <= start) end = forwardToBoundary(text, start + 1);
        yield* emit(text, { start, end });
        if (end >= sentence.end) break;
        const next = forwardToBoundary(text, end - overlap);
        start = next > start ? next : end;
      }
      continue;
    }

    if (!window) {
      window = { ...sentence };
      continue;
    }

    if (sentence.end - window.start <= maxChunkSize) {
      window.end = sentence.end;
      continue;
    }

    yield* emit(text, window);
    const carried = forwardToBoundary(text, Math.max(window.end - overlap, sentence.end - maxChunkSize, window.start));
    window = { start: carried, end: sentence.end };
  }

  if (window) yield* emit(text, window);
}

function splitsPair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return false;
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/** Cut positions never fall inside a surrogate pair. */
function backToBoundary(text: string, index: number): number {
  return splitsPair(text, index) ? index - 1 : index;
}

function forwardToBoundary(text: string, index: number): number {
  return splitsPair(text, index) ? index + 1 : index;
}

function* emit(text: string, range: Range): Generator<ChunkSegment> {
  const slice = text.slice(range.start, range.end);
  if (!slice.trim()) return;
  yield { text: slice.trim(), start: range.start, end: range.end };
}

/**
 * Merge segments below `minChunkSize` into a neighbour. A short segment is
 * folded into the one before it; a short first segment absorbs the one after
 * it. Merging re-slices the source so overlapping text is not duplicated.
 */
function* mergeShortSegments(
  text: string,
  segments: Iterable<ChunkSegment>,
  minChunkSize: number,
): Generator<ChunkSegment> {
  let held: ChunkSegment | null = null;
  for (const segment of segments) {
    if (!held) {
      held = segment;
      continue;
    }
    if (segment.text.length < minChunkSize || held.text.length < minChunkSize) {
      held = join(text, held, segment);
      continue;
    }
    yield held;
    held = segment;
  }
  if (held) yield held;
}

function join(text: string, left: ChunkSegment, right: ChunkSegment): ChunkSegment {
  const start = Math.min(left.start, right.start);
  const end = Math.max(left.end, right.end);
  return { text: text.slice(start, end).trim(), start, end };
}

/**
 * Chunk several texts (one per message or file) without letting a segment
 * span two of them.
 */
export function chunkTexts(texts: string[], options: Partial<ChunkOptions> = {}): ChunkSegment[] {
  const segments: ChunkSegment[] = [];
  for (const text of texts) {
    segments.push(...chunkText(text, options));
  }
  return segments;
}

/**
 * Bind segments to a tenant, numbering them from `firstSequenceIndex`.
 */
export function createChunks(
  segments: ChunkSegment[],
  tenant: Tenant,
  sourceTimestamp: string,
  firstSequenceIndex: number,
): Chunk[] {
  return segments.map((segment, offset) => ({
    text: segment.text,
    tenant,
    sourceTimestamp,
    sequenceIndex: firstSequenceIndex + offset,
  }));
}
