import OpenAI, { toFile } from 'openai';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { ServiceError, toError } from '../utils/errors';
import { statusOf } from '../utils/http';
import { Transcriber } from '../types/channel';

const TRANSCRIPTION_MODEL = 'whisper-1';
const EMBEDDING_MODEL = 'text-embedding-3-small';
const MAX_RETRIES = 3;

export class OpenAIService implements Transcriber {
  constructor(private client: OpenAI = new OpenAI({ apiKey: env.OPENAI_API_KEY })) {}

  async transcribe(audio: Buffer, filename: string): Promise<string> {
    return this.withRetry('transcribe', async () => {
      const file = await toFile(audio, filename);
      const result = await this.client.audio.transcriptions.create({ file, model: TRANSCRIPTION_MODEL });
      logger.debug('Voice note transcribed', { filename, length: result.text.length });
      return result.text.trim();
    });
  }

  async embed(text: string): Promise<number[]> {
    return this.withRetry('embed', async () => {
      const result = await this.client.embeddings.create({ model: EMBEDDING_MODEL, input: text });
      const vector = result.data[0]?.embedding;
      if (!vector) {
        throw new Error('Empty embedding response');
      }
      return vector;
    });
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let lastError: Error = new Error('no attempts made');

    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = toError(error);
        const status = statusOf(error);

        if (status === 429) {
          const delay = Math.pow(2, attempt) * 1000;
          logger.warn('OpenAI rate limited, backing off', { attempt, delay, operation });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('OpenAI', operation, lastError, false);
        }

        logger.error('OpenAI error', { attempt, operation, error: lastError.message });
      }
    }

    throw new ServiceError('OpenAI', operation, lastError);
  }
}
