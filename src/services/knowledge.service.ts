import { z } from 'zod';
import { query } from '../config/database';
import { KnowledgeSearch } from '../types/profiles';
import { logger } from '../utils/logger';

const matchRowSchema = z.object({
  content: z.string(),
  similarity: z.coerce.number(),
});

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export class KnowledgeService implements KnowledgeSearch {
  constructor(
    private embedder: Embedder,
    private threshold: number = 0.3
  ) {}

  async search(searchQuery: string, topK: number = 5): Promise<string> {
    const embedding = await this.embedder.embed(searchQuery);
    const result = await query(
      'SELECT content, similarity FROM match_vectors($1::vector, $2, $3, NULL)',
      [`[${embedding.join(',')}]`, topK, this.threshold]
    );

    const matches = result.rows.map((row) => matchRowSchema.parse(row));
    logger.debug('Knowledge search', { query: searchQuery, matches: matches.length });
    return formatMatches(matches);
  }
}

export function formatMatches(matches: Array<{ content: string; similarity: number }>): string {
  if (matches.length === 0) {
    return 'No relevant documents found.';
  }
  return matches.map((m) => `🔹 ${m.content} (score: ${m.similarity.toFixed(2)})`).join('\n\n');
}
