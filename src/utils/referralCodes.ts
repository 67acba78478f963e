import { ExtractedReferralCodes } from '../types/referral';

const REFERRAL_PATTERN = /\(Referral code: _([A-Z]{4})-([A-Z]{6})_\)/;

export function extractReferralCodes(text: string): ExtractedReferralCodes {
  const match = REFERRAL_PATTERN.exec(text);
  if (!match) {
    return { campaignCode: null, referralCode: null };
  }
  return { campaignCode: match[1], referralCode: match[2] };
}

export function formatReferralTag(campaignCode: string, referralCode: string): string {
  return `(Referral code: _${campaignCode}-${referralCode}_)`;
}
