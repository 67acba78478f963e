import { CustomerProfile, DEFAULT_CUSTOMER_TYPE } from '../types/customer';
import { AccountingProfileSource, StorefrontProfile, StorefrontProfileSource } from '../types/profiles';
import { CustomerStore } from '../types/store';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { compactProfileUpdates, hasUpdates } from '../utils/profileMerge';

function needsResync(profile: CustomerProfile): boolean {
  return (
    !profile.customer_name ||
    !profile.email ||
    !profile.accounting_id ||
    !profile.customer_type ||
    !profile.company_name ||
    !profile.is_active
  );
}

export function joinAddress(parts: Array<string | null>): string | null {
  const present = parts.filter((p): p is string => typeof p === 'string' && p.trim() !== '');
  return present.length > 0 ? present.join(', ') : null;
}

/**
 * Finds or creates the customer behind a channel address, filling gaps from the
 * accounting system first and the storefront second.
 */
export class IdentityService {
  constructor(
    private store: CustomerStore,
    private accounting: AccountingProfileSource,
    private storefront: StorefrontProfileSource
  ) {}

  async resolve(phone: string): Promise<CustomerProfile> {
    const local = await this.store.getCustomerByPhone(phone);
    if (local && !needsResync(local)) {
      return local;
    }

    // Accounting failures propagate to the caller.
    const accounting = await this.accounting.lookupByPhone(phone);

    if (accounting && local) {
      const updates = compactProfileUpdates(accounting);
      if (!hasUpdates(updates)) {
        return local;
      }
      logger.info('Updating customer from accounting record', { phone });
      return (await this.store.updateCustomer(phone, updates)) ?? local;
    }

    if (accounting) {
      logger.info('Creating customer from accounting record', { phone });
      return this.store.createCustomer({
        phone_number: phone,
        ...accounting,
        customer_type: accounting.customer_type ?? DEFAULT_CUSTOMER_TYPE,
        escalation_status: false,
        total_spend: 0,
      });
    }

    if (local) {
      return local;
    }

    const storefront = await this.lookupStorefront(phone);
    if (storefront) {
      logger.info('Creating customer from storefront record', { phone });
      return this.store.createCustomer({
        phone_number: phone,
        customer_name: storefront.displayName,
        email: storefront.email,
        address: joinAddress(storefront.addressParts),
        total_spend: storefront.totalSpent ?? 0,
        storefront_id: storefront.storefront_id,
        customer_type: DEFAULT_CUSTOMER_TYPE,
        is_active: true,
        escalation_status: false,
      });
    }

    logger.info('Creating minimal customer record', { phone });
    return this.store.createCustomer({
      phone_number: phone,
      customer_type: DEFAULT_CUSTOMER_TYPE,
      is_active: true,
      escalation_status: false,
      total_spend: 0,
    });
  }

  private async lookupStorefront(phone: string): Promise<StorefrontProfile | null> {
    try {
      return await this.storefront.lookupByPhone(phone);
    } catch (error) {
      logger.error('Storefront lookup failed', { phone, error: errorMessage(error) });
      return null;
    }
  }
}
