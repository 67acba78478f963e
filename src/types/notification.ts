export interface NotificationJobData {
  type: 'referral_credited';
  recipient: string;
  referral_code: string;
  referred_phone: string;
}

export interface NotificationDispatcher {
  dispatch(job: NotificationJobData): Promise<void>;
}
