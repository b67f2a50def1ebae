import { promises as fs } from 'fs';
import path from 'path';
import { WRITER_CONFIG } from '../config/writer';
import type { ClientProfile } from '../types/article';
import { isValidProfileName, normalizeClientProfile } from '../utils/profile';
import { getSupabaseAdmin, isSupabaseConfigured } from './supabaseAdmin';

const PROFILE_TABLE = 'client_profiles';

async function loadFromSupabase(name: string): Promise<ClientProfile | null> {
  const { data, error } = await getSupabaseAdmin()
    .from(PROFILE_TABLE)
    .select('name, tone, keywords')
    .eq('name', name)
    .maybeSingle();

  if (error) {
    throw new Error(`Failed to load client profile: ${error.message}`);
  }
  return data ? normalizeClientProfile(data, name) : null;
}

async function loadFromFile(name: string): Promise<ClientProfile | null> {
  const filePath = path.join(process.cwd(), WRITER_CONFIG.CLIENT_PROFILE_DIR, `${name}.json`);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
  return normalizeClientProfile(JSON.parse(content), name);
}

/**
 * Reads a client's tone and base keywords. Supabase is the source when configured; otherwise
 * `<CLIENT_PROFILE_DIR>/<name>.json` is used. Returns null for unknown names.
 */
export async function loadClientProfile(name: string): Promise<ClientProfile | null> {
  if (!isValidProfileName(name)) {
    return null;
  }
  return isSupabaseConfigured() ? loadFromSupabase(name) : loadFromFile(name);
}
