import { env } from '../../config/env';
import { ChannelAdapter, ChannelConfig, ChannelProvider, Transcriber } from '../../types/channel';
import { TwilioWhatsAppAdapter } from './twilio.adapter';
import { WhatsAppCloudAdapter } from './whatsapp-cloud.adapter';

export class ChannelFactory {
  static create(provider: ChannelProvider, config: ChannelConfig, transcriber?: Transcriber): ChannelAdapter {
    const c = config.credentials;
    switch (provider) {
      case 'whatsapp_cloud':
        return new WhatsAppCloudAdapter(
          { accessToken: c.WHATSAPP_ACCESS_TOKEN ?? '', phoneNumberId: c.WHATSAPP_PHONE_NUMBER_ID ?? '' },
          transcriber
        );
      case 'twilio':
        return new TwilioWhatsAppAdapter(
          {
            accountSid: c.TWILIO_ACCOUNT_SID ?? '',
            authToken: c.TWILIO_AUTH_TOKEN ?? '',
            whatsappNumber: c.TWILIO_WHATSAPP_NUMBER ?? '',
          },
          transcriber
        );
      default:
        throw new Error(`Unsupported channel provider: ${String(provider)}`);
    }
  }

  static fromEnv(transcriber?: Transcriber): ChannelAdapter {
    return ChannelFactory.create(
      env.CHANNEL_PROVIDER,
      {
        provider: env.CHANNEL_PROVIDER,
        credentials: {
          WHATSAPP_ACCESS_TOKEN: env.WHATSAPP_ACCESS_TOKEN,
          WHATSAPP_PHONE_NUMBER_ID: env.WHATSAPP_PHONE_NUMBER_ID,
          TWILIO_ACCOUNT_SID: env.TWILIO_ACCOUNT_SID,
          TWILIO_AUTH_TOKEN: env.TWILIO_AUTH_TOKEN,
          TWILIO_WHATSAPP_NUMBER: env.TWILIO_WHATSAPP_NUMBER,
        },
      },
      transcriber
    );
  }
}
