export type ChannelProvider = 'whatsapp_cloud' | 'twilio';

export type MediaKind = 'image' | 'audio' | 'document';

export interface InboundMessage {
  content: string;
  sender: string;
  message_id: string | null;
  provider: ChannelProvider;
  raw: unknown;
}

export interface ChannelConfig {
  provider: ChannelProvider;
  credentials: Record<string, string | undefined>;
}

export interface ChannelAdapter {
  readonly provider: ChannelProvider;
  /** Sender address read from the raw payload without normalising its content. */
  senderOf(payload: unknown): string | null;
  receive(payload: unknown, isVoice: boolean): Promise<InboundMessage | null>;
  sendText(to: string, text: string): Promise<void>;
  sendMedia(to: string, kind: MediaKind, url: string, caption?: string): Promise<void>;
}

export interface Transcriber {
  transcribe(audio: Buffer, filename: string): Promise<string>;
}
