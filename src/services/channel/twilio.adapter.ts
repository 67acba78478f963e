import twilio from 'twilio';
import { z } from 'zod';
import { ChannelAdapter, InboundMessage, MediaKind, Transcriber } from '../../types/channel';
import { logger } from '../../utils/logger';
import { ChannelError, toError } from '../../utils/errors';
import { request } from '../../utils/http';

export interface TwilioWhatsAppConfig {
  accountSid: string;
  authToken: string;
  whatsappNumber: string;
  retryDelayMs?: number;
}

const inboundSchema = z.object({
  From: z.string(),
  Body: z.string().default(''),
  MessageSid: z.string().optional(),
  NumMedia: z.coerce.number().int().nonnegative().default(0),
  MediaUrl0: z.string().optional(),
  MediaContentType0: z.string().optional(),
});

/** `whatsapp:+15551234567` → `15551234567` */
export function normalizeAddress(address: string): string {
  return address.replace(/^whatsapp:/, '').replace(/^\+/, '');
}

export class TwilioWhatsAppAdapter implements ChannelAdapter {
  readonly provider = 'twilio' as const;
  private client: ReturnType<typeof twilio>;

  constructor(
    private config: TwilioWhatsAppConfig,
    private transcriber?: Transcriber
  ) {
    if (!config.accountSid || !config.authToken || !config.whatsappNumber) {
      throw new ChannelError('twilio', 'init', new Error('Missing Twilio credentials'), false);
    }
    this.client = twilio(config.accountSid, config.authToken);
  }

  senderOf(payload: unknown): string | null {
    const parsed = inboundSchema.safeParse(payload);
    return parsed.success ? normalizeAddress(parsed.data.From) : null;
  }

  async receive(payload: unknown, isVoice: boolean): Promise<InboundMessage | null> {
    const parsed = inboundSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }

    const inbound = parsed.data;
    const content = await this.toContent(inbound, isVoice);
    if (!content) {
      return null;
    }

    return {
      content,
      sender: normalizeAddress(inbound.From),
      message_id: inbound.MessageSid ?? null,
      provider: this.provider,
      raw: payload,
    };
  }

  async sendText(to: string, text: string): Promise<void> {
    await this.create(to, 'sendText', { body: text });
  }

  async sendMedia(to: string, _kind: MediaKind, url: string, caption?: string): Promise<void> {
    await this.create(to, 'sendMedia', { body: caption, mediaUrl: [url] });
  }

  private async toContent(inbound: z.infer<typeof inboundSchema>, isVoice: boolean): Promise<string> {
    if (inbound.NumMedia === 0 || !inbound.MediaUrl0) {
      return inbound.Body;
    }

    const url = inbound.MediaUrl0;
    const type = inbound.MediaContentType0 ?? '';

    if (type.startsWith('audio/')) {
      if (isVoice && this.transcriber) {
        const res = await request('Twilio', url, {
          headers: {
            Authorization: `Basic ${Buffer.from(`${this.config.accountSid}:${this.config.authToken}`).toString('base64')}`,
          },
        });
        return this.transcriber.transcribe(Buffer.from(await res.arrayBuffer()), 'voice.ogg');
      }
      return `[Audio Message](${url})`;
    }

    if (type.startsWith('image/')) {
      return `![${inbound.Body || 'Image'}](${url})`;
    }

    return `[${inbound.Body || 'Document'}](${url})`;
  }

  private async create(to: string, operation: string, params: { body?: string; mediaUrl?: string[] }): Promise<void> {
    const maxRetries = 3;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        await this.client.messages.create({
          to: `whatsapp:+${normalizeAddress(to)}`,
          from: `whatsapp:+${normalizeAddress(this.config.whatsappNumber)}`,
          ...params,
        });
        logger.info('WhatsApp message sent', { provider: 'twilio', to, attempt });
        return;
      } catch (error) {
        const err = toError(error);
        logger.warn('Twilio send failed', { to, attempt, error: err.message });

        if (attempt === maxRetries) {
          throw new ChannelError('twilio', operation, err, false);
        }

        const delay = (this.config.retryDelayMs ?? 1000) * Math.pow(2, attempt - 1);
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
}
