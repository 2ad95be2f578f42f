/**
 * Transcript chunking
 *
 * Splits a transcript into paragraphs, then sentences, and packs sentences into
 * chunks of at most `targetChars` characters. Consecutive chunks share their
 * trailing sentences (up to `overlapChars`) so a concept spoken across a boundary
 * still lands whole in one chunk. A sentence longer than the target is split on
 * word boundaries.
 */

export type ChunkingOptions = {
  targetChars: number;
  overlapChars: number;
};

export type TextChunk = {
  ordinal: number;
  text: string;
};

type Unit = {
  text: string;
  /** first unit of a transcript paragraph */
  paragraphStart: boolean;
};

const SENTENCE_PATTERN = /[^.!?]+(?:[.!?]+["'”’)\]]*|$)/g;

// Once a chunk is at least this full, a new paragraph starts a new chunk.
const PARAGRAPH_BREAK_FILL = 0.5;

export function splitParagraphs(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split(/\n\s*\n+/)
    .map((para) => para.replace(/\s+/g, " ").trim())
    .filter(Boolean);
}

export function splitSentences(paragraph: string): string[] {
  const matches = paragraph.match(SENTENCE_PATTERN) ?? [];
  return matches.map((sentence) => sentence.trim()).filter(Boolean);
}

/**
 * Force-split an over-long sentence into word runs no longer than maxChars.
 * A single word longer than maxChars is kept whole.
 */
function splitLongSentence(sentence: string, maxChars: number): string[] {
  if (sentence.length <= maxChars) return [sentence];
  const pieces: string[] = [];
  let current = "";
  for (const word of sentence.split(" ")) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= maxChars) {
      current += ` ${word}`;
    } else {
      pieces.push(current);
      current = word;
    }
  }
  if (current) pieces.push(current);
  return pieces;
}

function joinUnits(units: Unit[]): string {
  return units
    .map((unit, idx) => (idx === 0 ? unit.text : `${unit.paragraphStart ? "\n\n" : " "}${unit.text}`))
    .join("");
}

function toUnits(text: string, targetChars: number): Unit[] {
  const units: Unit[] = [];
  for (const paragraph of splitParagraphs(text)) {
    let first = true;
    for (const sentence of splitSentences(paragraph)) {
      for (const piece of splitLongSentence(sentence, targetChars)) {
        units.push({ text: piece, paragraphStart: first });
        first = false;
      }
    }
  }
  return units;
}

function overlapTail(units: Unit[], overlapChars: number): Unit[] {
  if (overlapChars <= 0) return [];
  const tail: Unit[] = [];
  // never carry the whole chunk forward, or the next chunk could repeat it
  for (let i = units.length - 1; i >= 1; i--) {
    const candidate = [units[i], ...tail];
    if (joinUnits(candidate).length > overlapChars) break;
    tail.unshift(units[i]);
  }
  return tail;
}

export function chunkTranscript(text: string, options: ChunkingOptions): TextChunk[] {
  const { targetChars, overlapChars } = options;
  const units = toUnits(text, targetChars);
  const chunks: string[] = [];

  let current: Unit[] = [];
  let freshCount = 0;

  const flush = () => {
    chunks.push(joinUnits(current));
    current = overlapTail(current, overlapChars);
    freshCount = 0;
  };

  for (const unit of units) {
    if (
      freshCount > 0 &&
      unit.paragraphStart &&
      joinUnits(current).length >= targetChars * PARAGRAPH_BREAK_FILL
    ) {
      flush();
    }
    while (current.length > 0 && joinUnits([...current, unit]).length > targetChars) {
      if (freshCount > 0) {
        flush();
      } else {
        // only carried-over overlap left; drop it from the front until the unit fits
        current = current.slice(1);
      }
    }
    current.push(unit);
    freshCount += 1;
  }

  if (freshCount > 0) chunks.push(joinUnits(current));

  return chunks.map((chunk, ordinal) => ({ ordinal, text: chunk }));
}
