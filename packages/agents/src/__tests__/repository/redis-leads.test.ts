/**
 * Redis Lead Repository Tests
 *
 * Runs against an in-process RedisStore stand-in.
 *
 * @module __tests__/repository/redis-leads.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  TenantAccessError,
  hashProfileUrl,
  leadDedupKey,
  leadIndexKey,
  leadKey,
} from '@leadforge/lib';
import { RedisLeadRepository } from '../../repository';
import { FakeRedis, ORG_ID, OTHER_ORG_ID, createLead, fixedClock } from '../fixtures';

describe('RedisLeadRepository', () => {
  let redis: FakeRedis;
  let leads: RedisLeadRepository;

  beforeEach(() => {
    redis = new FakeRedis();
    leads = new RedisLeadRepository(redis, { now: fixedClock });
  });

  it('stores the lead, its index entry and its dedup claim', async () => {
    const { lead, created } = await leads.getOrCreateByProfileUrl(ORG_ID, {
      name: 'Jane',
      profile_url: 'https://www.linkedin.com/in/jane/',
    });

    expect(created).toBe(true);
    expect(lead.profile_url).toBe('https://linkedin.com/in/jane');
    expect(redis.values.get(leadKey(ORG_ID, lead.id))).toEqual(lead);
    expect(redis.values.get(leadDedupKey(ORG_ID, hashProfileUrl('https://linkedin.com/in/jane')))).toBe(lead.id);
    expect(await redis.smembers(leadIndexKey(ORG_ID))).toEqual([lead.id]);
  });

  it('resolves concurrent creates for one URL to a single lead', async () => {
    const results = await Promise.all(
      ['Jane', 'Jane D.', 'J. Doe'].map((name) =>
        leads.getOrCreateByProfileUrl(ORG_ID, { name, profile_url: 'https://linkedin.com/in/jane' })
      )
    );

    const ids = new Set(results.map((r) => r.lead.id));
    expect(ids.size).toBe(1);
    expect(results.filter((r) => r.created)).toHaveLength(1);
    expect(await leads.list(ORG_ID)).toHaveLength(1);
    const storedLeadKeys = [...redis.values.keys()].filter((key) => key.startsWith(`leadforge:${ORG_ID}:lead:`));
    expect(storedLeadKeys).toHaveLength(1);
  });

  it('returns the existing lead on a later observation', async () => {
    const first = await leads.getOrCreateByProfileUrl(ORG_ID, { name: 'Jane', profile_url: 'linkedin.com/in/jane' });
    const second = await leads.getOrCreateByProfileUrl(ORG_ID, { name: 'Other', profile_url: 'linkedin.com/in/jane' });

    expect(second.created).toBe(false);
    expect(second.lead.id).toBe(first.lead.id);
    expect(second.lead.name).toBe('Jane');
  });

  it('updates a lead in place', async () => {
    const lead = await leads.create(ORG_ID, { name: 'Jane' });

    const updated = await leads.update(ORG_ID, lead.id, { score: 55 });

    expect(updated.score).toBe(55);
    expect((await leads.get(ORG_ID, lead.id))?.score).toBe(55);
  });

  it('fails closed when a stored record names another organization', async () => {
    redis.values.set(leadKey(ORG_ID, 'lead_x'), createLead({ id: 'lead_x', organization_id: OTHER_ORG_ID }));

    await expect(leads.get(ORG_ID, 'lead_x')).rejects.toBeInstanceOf(TenantAccessError);
  });

  it('does not see another organization\'s keys', async () => {
    const lead = await leads.create(ORG_ID, { name: 'Jane' });

    expect(await leads.get(OTHER_ORG_ID, lead.id)).toBeNull();
    expect(await leads.list(OTHER_ORG_ID)).toEqual([]);
  });
});
