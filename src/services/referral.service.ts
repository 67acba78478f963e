import { randomInt } from 'crypto';
import { env } from '../config/env';
import { CustomerProfile } from '../types/customer';
import { CODE_GENERATION_FAILED, ReferralRecord } from '../types/referral';
import { CampaignStatusSource } from '../types/profiles';
import { ReferralStore } from '../types/store';
import { NotificationDispatcher } from '../types/notification';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { extractReferralCodes, formatReferralTag } from '../utils/referralCodes';
import { channelTimestamp } from '../utils/time';
import { buildInvitationText, INVITE_UNAVAILABLE_TEXT } from '../utils/prompts';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const MAX_CODE_ATTEMPTS = 3;

export interface InviteSettings {
  botNumber: string;
  brandName: string;
  defaultCampaignCode: string;
}

type ReferrerContext = Pick<CustomerProfile, 'customer_name' | 'email' | 'accounting_id'>;

export class ReferralService {
  constructor(
    private store: ReferralStore,
    private campaigns: CampaignStatusSource,
    private notifications: NotificationDispatcher,
    private settings: InviteSettings = {
      botNumber: env.WHATSAPP_BOT_NUMBER,
      brandName: env.BRAND_NAME,
      defaultCampaignCode: env.DEFAULT_CAMPAIGN_CODE,
    },
    private random: (max: number) => number = (max) => randomInt(max)
  ) {}

  findByCode(code: string): Promise<ReferralRecord | null> {
    return this.store.getReferralByCode(code);
  }

  findByReferrer(phone: string): Promise<ReferralRecord | null> {
    return this.store.getReferralByReferrer(phone);
  }

  create(record: ReferralRecord): Promise<ReferralRecord> {
    return this.store.addReferral(record);
  }

  async creditReferral(code: string, referredPhone: string): Promise<boolean> {
    const applied = await this.store.addReferredUser(code, {
      phone_number: referredPhone,
      time_stamp: channelTimestamp(),
    });
    logger.info('Referral credit', { code, referredPhone, applied });
    return applied;
  }

  /** Fail-closed: anything other than a readable record without the phone counts as credited. */
  async isAlreadyCredited(phone: string, code: string): Promise<boolean> {
    try {
      const record = await this.store.getReferralByCode(code);
      if (!record) {
        logger.warn('Referral code not found', { code });
        return true;
      }
      return record.referred_users.some((u) => u.phone_number === phone);
    } catch (error) {
      logger.error('Referral lookup failed, treating as credited', { code, phone, error: errorMessage(error) });
      return true;
    }
  }

  generateCode(length: number = 6): string {
    try {
      let code = '';
      for (let i = 0; i < length; i++) {
        code += ALPHABET[this.random(ALPHABET.length)];
      }
      return code;
    } catch (error) {
      logger.error('Referral code generation failed', { error: errorMessage(error) });
      return CODE_GENERATION_FAILED;
    }
  }

  /** Credits an inbound referral tag, then replies with the caller's own invitation. */
  async referralWorkflow(message: string, phone: string, context?: ReferrerContext): Promise<string> {
    const { campaignCode, referralCode } = extractReferralCodes(message);

    try {
      if (campaignCode) {
        await this.checkCampaign(campaignCode);
      }
      if (referralCode) {
        await this.applyCredit(referralCode, phone);
      }
    } catch (error) {
      logger.error('Referral crediting failed', { phone, referralCode, error: errorMessage(error) });
    }

    return this.generateInvite(phone, context, campaignCode);
  }

  async generateInvite(phone: string, context?: ReferrerContext, campaignCode?: string | null): Promise<string> {
    let record = await this.store.getReferralByReferrer(phone);

    if (!record) {
      const code = await this.uniqueCode();
      if (code === CODE_GENERATION_FAILED) {
        logger.error('No referral record created, code generation failed', { phone });
        return INVITE_UNAVAILABLE_TEXT;
      }

      record = await this.create({
        referral_code: code,
        referrer_id: context?.accounting_id ?? null,
        referrer_phone: phone,
        referrer_name: context?.customer_name ?? null,
        referrer_email: context?.email ?? null,
        total_points: 0,
        referred_users: [],
        campaign_id: campaignCode ?? null,
      });
    }

    const campaign = record.campaign_id ?? this.settings.defaultCampaignCode;
    return buildInvitationText(
      this.settings.botNumber,
      this.settings.brandName,
      formatReferralTag(campaign, record.referral_code)
    );
  }

  private async uniqueCode(): Promise<string> {
    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
      const code = this.generateCode();
      if (code === CODE_GENERATION_FAILED || !(await this.store.getReferralByCode(code))) {
        return code;
      }
      logger.warn('Referral code collision, regenerating', { attempt });
    }
    return CODE_GENERATION_FAILED;
  }

  private async checkCampaign(campaignCode: string): Promise<void> {
    try {
      if (!(await this.campaigns.isActive(campaignCode))) {
        logger.warn('Referral received for inactive campaign', { campaignCode });
      }
    } catch (error) {
      logger.warn('Campaign status check failed', { campaignCode, error: errorMessage(error) });
    }
  }

  private async applyCredit(code: string, phone: string): Promise<void> {
    if (await this.isAlreadyCredited(phone, code)) {
      logger.info('Referral already credited or unreadable, skipping', { code, phone });
      return;
    }

    const record = await this.store.getReferralByCode(code);
    if (record?.referrer_phone === phone) {
      logger.warn('Self-referral ignored', { code, phone });
      return;
    }

    const applied = await this.creditReferral(code, phone);
    if (applied && record?.referrer_phone) {
      await this.notifications.dispatch({
        type: 'referral_credited',
        recipient: record.referrer_phone,
        referral_code: code,
        referred_phone: phone,
      });
    }
  }
}
