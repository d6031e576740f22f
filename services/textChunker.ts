// Sentence boundary: terminal punctuation followed by whitespace
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

// Cuts on code point boundaries so surrogate pairs stay intact
const truncate = (word: string, maxChars: number): string => {
  let result = '';
  for (const char of word) {
    if (result.length + char.length > maxChars) break;
    result += char;
  }
  return result;
};

/**
 * Splits text into chunks of at most `maxChars`, preferring sentence
 * boundaries and falling back to word boundaries for oversized sentences.
 *
 * A single word longer than `maxChars` cannot be split cleanly and is
 * truncated to `maxChars`; the rest of that word is dropped.
 */
export function chunkText(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) return [text];

  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) chunks.push(trimmed);
    current = '';
  };

  for (const sentence of text.split(SENTENCE_BREAK)) {
    if (!sentence) continue;

    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }

    flush();
    if (sentence.length <= maxChars) {
      current = sentence;
      continue;
    }

    for (const word of sentence.split(/\s+/).filter(Boolean)) {
      const next = current ? `${current} ${word}` : word;
      if (next.length <= maxChars) {
        current = next;
        continue;
      }

      flush();
      if (word.length <= maxChars) {
        current = word;
      } else {
        chunks.push(truncate(word, maxChars));
      }
    }
  }

  flush();
  return chunks;
}
