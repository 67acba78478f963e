export interface ReferredUser {
  phone_number: string;
  time_stamp: string;
}

export interface ReferralRecord {
  referral_code: string;
  referrer_id: string | null;
  referrer_phone: string | null;
  referrer_name: string | null;
  referrer_email: string | null;
  total_points: number;
  referred_users: ReferredUser[];
  campaign_id: string | null;
}

export interface ExtractedReferralCodes {
  campaignCode: string | null;
  referralCode: string | null;
}

export const CODE_GENERATION_FAILED = 'ERROR';
