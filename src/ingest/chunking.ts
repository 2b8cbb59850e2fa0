/** Default token budget per chunk. */
export const DEFAULT_MAX_TOKENS_PER_CHUNK = 220;

/** Hard character cap used when a sentence alone exceeds the budget. */
const MAX_CHUNK_CHARS = 480;

/** Whitespace-delimited word count; 0 for blank text. */
export function estimateTokenUsage(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }
  return Math.max(1, trimmed.split(/\s+/u).length);
}

/**
 * Packs paragraphs (blank-line separated) into chunks of at most `maxTokens`.
 * Oversized paragraphs are split on sentence boundaries first.
 */
export function buildChunks(content: string, maxTokens = DEFAULT_MAX_TOKENS_PER_CHUNK): string[] {
  const paragraphs = content
    .split(/\n\s*\n/u)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);

  const chunks: string[] = [];
  let buffer: string[] = [];
  let tokenBudget = 0;

  const flush = () => {
    if (buffer.length === 0) {
      return;
    }
    chunks.push(buffer.join("\n\n"));
    buffer = [];
    tokenBudget = 0;
  };

  for (const paragraph of paragraphs) {
    const tokens = estimateTokenUsage(paragraph);

    if (tokens > maxTokens) {
      flush();
      chunks.push(...splitTextIntoChunks(paragraph, maxTokens));
      continue;
    }

    if (tokenBudget > 0 && tokenBudget + tokens > maxTokens) {
      flush();
    }
    buffer.push(paragraph);
    tokenBudget += tokens;
  }

  flush();
  return chunks;
}

export function splitTextIntoChunks(text: string, maxTokens: number): string[] {
  const sentences = text
    .split(/(?<=[.!?])\s+/u)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
  if (sentences.length === 0) {
    return splitByLength(text);
  }

  const chunks: string[] = [];
  let current = "";
  let tokens = 0;

  for (const sentence of sentences) {
    const sentenceTokens = estimateTokenUsage(sentence);
    if (sentenceTokens > maxTokens) {
      if (current) {
        chunks.push(current);
        current = "";
        tokens = 0;
      }
      chunks.push(...splitByLength(sentence));
      continue;
    }
    if (current && tokens + sentenceTokens > maxTokens) {
      chunks.push(current);
      current = "";
      tokens = 0;
    }
    current = current ? `${current} ${sentence}` : sentence;
    tokens += sentenceTokens;
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

export function splitByLength(text: string): string[] {
  const result: string[] = [];
  for (let index = 0; index < text.length; index += MAX_CHUNK_CHARS) {
    result.push(text.slice(index, index + MAX_CHUNK_CHARS));
  }
  return result;
}
