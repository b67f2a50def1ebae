import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockIsConfigured, mockMaybeSingle, mockEq, mockSelect, mockFrom } = vi.hoisted(() => ({
  mockIsConfigured: vi.fn(),
  mockMaybeSingle: vi.fn(),
  mockEq: vi.fn(),
  mockSelect: vi.fn(),
  mockFrom: vi.fn(),
}));

vi.mock('../../lib/supabaseAdmin', () => ({
  isSupabaseConfigured: mockIsConfigured,
  getSupabaseAdmin: () => ({ from: mockFrom }),
}));

import { loadClientProfile } from '../../lib/clientProfiles';
import { isValidProfileName, normalizeClientProfile } from '../../utils/profile';

describe('normalizeClientProfile', () => {
  it('dedupes keywords and accepts the snake_case column', () => {
    expect(
      normalizeClientProfile(
        { name: ' acme ', tone: ' upbeat ', base_keywords: ['Hiring', 'hiring', '  talent   pools '] },
        'fallback'
      )
    ).toEqual({ name: 'acme', tone: 'upbeat', baseKeywords: ['Hiring', 'talent pools'] });
  });

  it('splits a keyword string and falls back for missing fields', () => {
    expect(normalizeClientProfile({ keywords: 'one, two\nthree' }, 'beta')).toEqual({
      name: 'beta',
      tone: '',
      baseKeywords: ['one', 'two', 'three'],
    });
    expect(normalizeClientProfile(null, 'empty')).toEqual({ name: 'empty', tone: '', baseKeywords: [] });
  });

  it('only accepts simple profile names', () => {
    expect(isValidProfileName('acme_uk-2')).toBe(true);
    expect(isValidProfileName('../secrets')).toBe(false);
  });
});

describe('loadClientProfile', () => {
  beforeEach(() => {
    mockIsConfigured.mockReset();
    mockFrom.mockReset().mockReturnValue({ select: mockSelect });
    mockSelect.mockReset().mockReturnValue({ eq: mockEq });
    mockEq.mockReset().mockReturnValue({ maybeSingle: mockMaybeSingle });
    mockMaybeSingle.mockReset();
  });

  it('reads the bundled default profile from disk', async () => {
    mockIsConfigured.mockReturnValue(false);

    const profile = await loadClientProfile('default');

    expect(profile).toEqual({
      name: 'default',
      tone: 'professional yet approachable',
      baseKeywords: ['recruitment', 'talent acquisition', 'hiring', 'employer branding', 'workforce planning'],
    });
  });

  it('returns null for unknown or unsafe names', async () => {
    mockIsConfigured.mockReturnValue(false);

    expect(await loadClientProfile('no-such-client')).toBeNull();
    expect(await loadClientProfile('../package')).toBeNull();
  });

  it('queries the client_profiles table when Supabase is configured', async () => {
    mockIsConfigured.mockReturnValue(true);
    mockMaybeSingle.mockResolvedValue({ data: { name: 'acme', tone: 'bold', keywords: ['growth'] }, error: null });

    const profile = await loadClientProfile('acme');

    expect(mockFrom).toHaveBeenCalledWith('client_profiles');
    expect(mockSelect).toHaveBeenCalledWith('name, tone, keywords');
    expect(mockEq).toHaveBeenCalledWith('name', 'acme');
    expect(profile).toEqual({ name: 'acme', tone: 'bold', baseKeywords: ['growth'] });
  });

  it('surfaces query errors', async () => {
    mockIsConfigured.mockReturnValue(true);
    mockMaybeSingle.mockResolvedValue({ data: null, error: { message: 'permission denied' } });

    await expect(loadClientProfile('acme')).rejects.toThrow('Failed to load client profile: permission denied');
  });
});
