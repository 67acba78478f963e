import { z } from 'zod';
import { ChannelAdapter, InboundMessage, MediaKind, Transcriber } from '../../types/channel';
import { logger } from '../../utils/logger';
import { ChannelError, toError } from '../../utils/errors';
import { request, requestJson } from '../../utils/http';

export interface WhatsAppCloudConfig {
  accessToken: string;
  phoneNumberId: string;
  graphVersion?: string;
  retryDelayMs?: number;
}

const mediaSchema = z.object({
  id: z.string(),
  caption: z.string().optional(),
  filename: z.string().optional(),
  mime_type: z.string().optional(),
});

const messageSchema = z.object({
  from: z.string(),
  id: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).optional(),
  image: mediaSchema.optional(),
  audio: mediaSchema.optional(),
  voice: mediaSchema.optional(),
  document: mediaSchema.optional(),
  video: mediaSchema.optional(),
});

const webhookSchema = z.object({
  entry: z
    .array(
      z.object({
        changes: z
          .array(z.object({ value: z.object({ messages: z.array(messageSchema).optional() }).passthrough() }))
          .optional(),
      })
    )
    .optional(),
});

const mediaUrlSchema = z.object({ url: z.string().url() });

type CloudMessage = z.infer<typeof messageSchema>;

export function firstMessage(payload: unknown): CloudMessage | null {
  const parsed = webhookSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.entry?.[0]?.changes?.[0]?.value.messages?.[0] ?? null;
}

/** Voice notes arrive as `audio` (or `voice`) messages and are transcribed before handling. */
export function isVoicePayload(payload: unknown): boolean {
  const message = firstMessage(payload);
  return message?.type === 'audio' || message?.type === 'voice';
}

export class WhatsAppCloudAdapter implements ChannelAdapter {
  readonly provider = 'whatsapp_cloud' as const;
  private baseUrl: string;

  constructor(
    private config: WhatsAppCloudConfig,
    private transcriber?: Transcriber
  ) {
    if (!config.accessToken || !config.phoneNumberId) {
      throw new ChannelError('whatsapp_cloud', 'init', new Error('Missing WhatsApp Cloud credentials'), false);
    }
    this.baseUrl = `https://graph.facebook.com/${config.graphVersion ?? 'v20.0'}`;
  }

  senderOf(payload: unknown): string | null {
    return firstMessage(payload)?.from ?? null;
  }

  async receive(payload: unknown, isVoice: boolean): Promise<InboundMessage | null> {
    const message = firstMessage(payload);
    if (!message) {
      return null;
    }

    const content = await this.toContent(message, isVoice);
    logger.info('WhatsApp message received', { from: message.from, type: message.type });
    return {
      content,
      sender: message.from,
      message_id: message.id ?? null,
      provider: this.provider,
      raw: payload,
    };
  }

  async sendText(to: string, text: string): Promise<void> {
    await this.send(to, 'sendText', { type: 'text', text: { body: text, preview_url: true } });
  }

  async sendMedia(to: string, kind: MediaKind, url: string, caption?: string): Promise<void> {
    // The Cloud API rejects captions on audio.
    const media = kind === 'audio' || !caption ? { link: url } : { link: url, caption };
    await this.send(to, 'sendMedia', { type: kind, [kind]: media });
  }

  private async toContent(message: CloudMessage, isVoice: boolean): Promise<string> {
    if (message.type === 'text' && message.text) {
      return message.text.body;
    }

    const voice = message.audio ?? message.voice;
    if (isVoice && voice) {
      return this.transcribe(voice.id);
    }

    switch (message.type) {
      case 'image':
        return this.mediaLink(message.image, (m, url) => `![${m.caption || 'Image'}](${url})`);
      case 'audio':
      case 'voice':
        return this.mediaLink(voice, (_m, url) => `[Audio Message](${url})`);
      case 'document':
        return this.mediaLink(message.document, (m, url) => `[${m.caption || m.filename || 'Document'}](${url})`);
      case 'video':
        return this.mediaLink(message.video, (m, url) => `[${m.caption || 'Video'}](${url})`);
      default:
        logger.warn('Unsupported WhatsApp message type', { from: message.from, type: message.type });
        return `[${message.type.toUpperCase()} MESSAGE]`;
    }
  }

  private async mediaLink(
    media: z.infer<typeof mediaSchema> | undefined,
    format: (media: z.infer<typeof mediaSchema>, url: string) => string
  ): Promise<string> {
    if (!media) {
      return '[MEDIA MESSAGE]';
    }
    return format(media, await this.resolveMediaUrl(media.id));
  }

  private async resolveMediaUrl(mediaId: string): Promise<string> {
    const body = await requestJson('WhatsAppCloud', `${this.baseUrl}/${mediaId}`, {
      headers: this.authHeaders(),
      retryDelayMs: this.config.retryDelayMs,
    });
    return mediaUrlSchema.parse(body).url;
  }

  private async transcribe(mediaId: string): Promise<string> {
    if (!this.transcriber) {
      throw new ChannelError('whatsapp_cloud', 'transcribe', new Error('No transcriber configured'), false);
    }

    const url = await this.resolveMediaUrl(mediaId);
    const res = await request('WhatsAppCloud', url, {
      headers: this.authHeaders(),
      retryDelayMs: this.config.retryDelayMs,
    });
    const audio = Buffer.from(await res.arrayBuffer());
    return this.transcriber.transcribe(audio, `voice_${mediaId}.ogg`);
  }

  private async send(to: string, operation: string, body: Record<string, unknown>): Promise<void> {
    try {
      await request('WhatsAppCloud', `${this.baseUrl}/${this.config.phoneNumberId}/messages`, {
        method: 'POST',
        headers: { ...this.authHeaders(), 'Content-Type': 'application/json' },
        body: JSON.stringify({ messaging_product: 'whatsapp', recipient_type: 'individual', to, ...body }),
        // A timed-out POST may still have been delivered.
        maxRetries: 1,
        retryDelayMs: this.config.retryDelayMs,
      });
      logger.info('WhatsApp message sent', { to, type: body.type });
    } catch (error) {
      throw new ChannelError('whatsapp_cloud', operation, toError(error), false);
    }
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.accessToken}` };
  }
}
