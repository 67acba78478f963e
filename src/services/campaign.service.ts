import { CampaignStatusSource } from '../types/profiles';
import { CampaignStore } from '../types/store';

export class CampaignService implements CampaignStatusSource {
  constructor(private store: CampaignStore) {}

  async isActive(campaignCode: string): Promise<boolean> {
    return this.store.isCampaignActive(campaignCode);
  }
}
