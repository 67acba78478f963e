import { ReferralService, InviteSettings } from '../../src/services/referral.service';
import { CODE_GENERATION_FAILED } from '../../src/types/referral';
import { extractReferralCodes } from '../../src/utils/referralCodes';
import { INVITE_UNAVAILABLE_TEXT } from '../../src/utils/prompts';
import { InMemoryStore } from '../helpers/memoryStore';
import { makeReferral } from '../helpers/fakes';

const settings: InviteSettings = {
  botNumber: '15550001111',
  brandName: 'Test Shop',
  defaultCampaignCode: 'WELC',
};

function inviteCodes(invite: string) {
  const link = /https:\/\/wa\.me\/\S+/.exec(invite)?.[0] ?? '';
  return extractReferralCodes(new URL(link).searchParams.get('text') ?? '');
}

describe('ReferralService', () => {
  let store: InMemoryStore;
  let dispatch: jest.Mock;
  let isActive: jest.Mock;
  let service: ReferralService;

  beforeEach(() => {
    store = new InMemoryStore();
    dispatch = jest.fn().mockResolvedValue(undefined);
    isActive = jest.fn().mockResolvedValue(true);
    service = new ReferralService(store, { isActive }, { dispatch }, settings, () => 0);
  });

  describe('generateCode', () => {
    it('should build codes from the random source', () => {
      const values = [0, 1, 2, 25, 24, 23];
      const seeded = new ReferralService(store, { isActive }, { dispatch }, settings, () => values.shift() ?? 0);
      expect(seeded.generateCode()).toBe('ABCZYX');
    });

    it('should honour the requested length', () => {
      expect(service.generateCode(4)).toBe('AAAA');
    });

    it('should return the failure sentinel when randomness fails', () => {
      const broken = new ReferralService(store, { isActive }, { dispatch }, settings, () => {
        throw new Error('entropy unavailable');
      });
      expect(broken.generateCode()).toBe(CODE_GENERATION_FAILED);
    });
  });

  describe('isAlreadyCredited', () => {
    it('should be false when the phone is not listed', async () => {
      await store.addReferral(makeReferral());
      expect(await service.isAlreadyCredited('15550003333', 'QWERTY')).toBe(false);
    });

    it('should be true when the phone is listed', async () => {
      await store.addReferral(
        makeReferral({ referred_users: [{ phone_number: '15550003333', time_stamp: '2024-05-01 10:00:00' }] })
      );
      expect(await service.isAlreadyCredited('15550003333', 'QWERTY')).toBe(true);
    });

    it('should fail closed for an unknown code', async () => {
      expect(await service.isAlreadyCredited('15550003333', 'NOCODE')).toBe(true);
    });

    it('should fail closed when the store errors', async () => {
      jest.spyOn(store, 'getReferralByCode').mockRejectedValueOnce(new Error('malformed row'));
      expect(await service.isAlreadyCredited('15550003333', 'QWERTY')).toBe(true);
    });
  });

  describe('creditReferral', () => {
    it('should credit a phone only once', async () => {
      await store.addReferral(makeReferral());

      expect(await service.creditReferral('QWERTY', '15550003333')).toBe(true);
      expect(await service.creditReferral('QWERTY', '15550003333')).toBe(false);

      const record = store.referrals.get('QWERTY');
      expect(record?.total_points).toBe(1);
      expect(record?.referred_users.map((u) => u.phone_number)).toEqual(['15550003333']);
      expect(record?.referred_users[0].time_stamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });
  });

  describe('referralWorkflow', () => {
    const message = "Hi! I'd like to chat with Test Shop. (Referral code: _WELC-QWERTY_)";

    beforeEach(async () => {
      await store.addReferral(makeReferral());
    });

    it('should credit the referrer, notify them, and invite the newcomer', async () => {
      const invite = await service.referralWorkflow(message, '15550003333');

      expect(store.referrals.get('QWERTY')?.total_points).toBe(1);
      expect(dispatch).toHaveBeenCalledWith({
        type: 'referral_credited',
        recipient: '15550002222',
        referral_code: 'QWERTY',
        referred_phone: '15550003333',
      });

      const own = store.referrals.get('AAAAAA');
      expect(own).toMatchObject({ referrer_phone: '15550003333', total_points: 0, campaign_id: 'WELC', referred_users: [] });
      expect(inviteCodes(invite)).toEqual({ campaignCode: 'WELC', referralCode: 'AAAAAA' });
      expect(invite).toContain('https://wa.me/15550001111/?text=');
    });

    it('should not credit the same phone twice', async () => {
      await service.referralWorkflow(message, '15550003333');
      const second = await service.referralWorkflow(message, '15550003333');

      expect(store.referrals.get('QWERTY')?.total_points).toBe(1);
      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(inviteCodes(second).referralCode).toBe('AAAAAA');
    });

    it('should ignore a referrer using their own code', async () => {
      await service.referralWorkflow(message, '15550002222');

      expect(store.referrals.get('QWERTY')?.total_points).toBe(0);
      expect(dispatch).not.toHaveBeenCalled();
    });

    it('should still credit when the campaign is inactive or its check fails', async () => {
      isActive.mockResolvedValueOnce(false);
      await service.referralWorkflow(message, '15550003333');

      isActive.mockRejectedValueOnce(new Error('db down'));
      await service.referralWorkflow(message, '15550004444');

      expect(store.referrals.get('QWERTY')?.total_points).toBe(2);
    });

    it('should still return an invite when crediting fails', async () => {
      jest.spyOn(store, 'addReferredUser').mockRejectedValueOnce(new Error('write failed'));

      const invite = await service.referralWorkflow(message, '15550003333');

      expect(dispatch).not.toHaveBeenCalled();
      expect(inviteCodes(invite).referralCode).toBe('AAAAAA');
    });
  });

  describe('generateInvite', () => {
    it('should fall back to the default campaign', async () => {
      await store.addReferral(makeReferral({ referrer_phone: '15550005555', referral_code: 'ZZZZZZ', campaign_id: null }));
      const invite = await service.generateInvite('15550005555');
      expect(inviteCodes(invite)).toEqual({ campaignCode: 'WELC', referralCode: 'ZZZZZZ' });
    });

    it('should copy name and email from the customer', async () => {
      await service.generateInvite('15550006666', { customer_name: 'Bo', email: 'bo@example.com', accounting_id: 'QB-9' });
      expect(store.referrals.get('AAAAAA')).toMatchObject({
        referrer_name: 'Bo',
        referrer_email: 'bo@example.com',
        referrer_id: 'QB-9',
        campaign_id: null,
      });
    });

    it('should store nothing when a code cannot be generated', async () => {
      const broken = new ReferralService(store, { isActive }, { dispatch }, settings, () => {
        throw new Error('entropy unavailable');
      });

      expect(await broken.generateInvite('15550006666')).toBe(INVITE_UNAVAILABLE_TEXT);
      expect(await store.getReferralByReferrer('15550006666')).toBeNull();
    });

    it('should regenerate a code that is already taken', async () => {
      await store.addReferral(makeReferral({ referral_code: 'AAAAAA', referrer_phone: '15550007777' }));
      const values = [0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 1, 1];
      const seeded = new ReferralService(store, { isActive }, { dispatch }, settings, () => values.shift() ?? 0);

      const invite = await seeded.generateInvite('15550006666');

      expect(inviteCodes(invite).referralCode).toBe('BBBBBB');
      expect(store.referrals.get('AAAAAA')?.referrer_phone).toBe('15550007777');
    });
  });
});
