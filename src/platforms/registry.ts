import { ACCOUNT_TYPES, PLATFORMS, type AccountType, type Platform } from '../config.js';
import type { AccountGroup, AccountRegistry, AccountTarget } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { SOCIAL_CODES, type SmmBoxClient, type SmmBoxGroup } from './smmbox.js';

const PLATFORM_BY_CODE = new Map<string, Platform>(
  PLATFORMS.map(p => [SOCIAL_CODES[p], p] as const),
);

const isAccountType = (v: string): v is AccountType => ACCOUNT_TYPES.some(t => t === v);

export function toAccountTarget(group: SmmBoxGroup): AccountTarget | null {
  const platform = PLATFORM_BY_CODE.get(group.social.toLowerCase());
  const type = group.type.toLowerCase();
  if (!platform || !isAccountType(type)) return null;
  return { accountId: group.id, platform, type, ...(group.name ? { name: group.name } : {}) };
}

/** Connected accounts, grouped by platform in the fixed platform order. */
export class SmmBoxAccountRegistry implements AccountRegistry {
  constructor(private readonly client: Pick<SmmBoxClient, 'listGroups'>) {}

  async listAccounts(): Promise<AccountGroup[]> {
    const groups = await this.client.listGroups();
    const byPlatform = new Map<Platform, AccountTarget[]>();
    let skipped = 0;

    for (const group of groups) {
      const target = toAccountTarget(group);
      if (!target) {
        skipped++;
        continue;
      }
      const list = byPlatform.get(target.platform) ?? [];
      list.push(target);
      byPlatform.set(target.platform, list);
    }

    if (skipped) logger.warn('Registry: skipped groups on unsupported networks', { skipped });

    return PLATFORMS
      .filter(p => byPlatform.has(p))
      .map(platform => {
        const accounts = byPlatform.get(platform) ?? [];
        return { platform, count: accounts.length, accounts };
      });
  }
}

const isPlatform = (v: string): v is Platform => PLATFORMS.some(p => p === v);

/** Parse a CLI account reference `<platform>:<type>:<accountId>`. */
export function parseAccountRef(ref: string): AccountTarget {
  const [platform = '', type = '', ...rest] = ref.split(':');
  const accountId = rest.join(':').trim();
  if (!isPlatform(platform) || !isAccountType(type) || !accountId) {
    throw new Error(
      `Invalid account "${ref}": expected <platform>:<type>:<accountId> ` +
      `with platform in {${PLATFORMS.join(', ')}} and type in {${ACCOUNT_TYPES.join(', ')}}`,
    );
  }
  return { accountId, platform, type };
}
