import { CustomerUpdate, PersonalInfo } from '../types/customer';

type Present<T> = { [K in keyof T]?: Exclude<T[K], null | undefined> };

function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Keeps only the fields that carry a value. A blank never overwrites stored data,
 * and the escalation flag is only ever changed through its own operation.
 */
export function compactProfileUpdates<T extends object>(updates: T): Present<Omit<T, 'escalation_status'>> {
  const result: Present<Omit<T, 'escalation_status'>> = {};
  for (const [key, value] of Object.entries(updates)) {
    if (key === 'escalation_status' || isBlank(value)) continue;
    Object.assign(result, { [key]: value });
  }
  return result;
}

export function personalInfoToUpdate(info: PersonalInfo): CustomerUpdate {
  return compactProfileUpdates({
    customer_name: info.customer_name,
    email: info.email,
    address: info.address,
    socials: info.socials,
    interest_groups: info.interest_groups,
  });
}

export function hasUpdates(updates: object): boolean {
  return Object.keys(updates).length > 0;
}
