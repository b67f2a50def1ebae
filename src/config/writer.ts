function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const WRITER_CONFIG = {
  MODEL: process.env.WRITER_MODEL?.trim() || 'gpt-4o-mini',
  TEMPERATURE: readNumber('WRITER_TEMPERATURE', 0.7),
  MAX_OUTPUT_TOKENS: readNumber('WRITER_MAX_OUTPUT_TOKENS', 8000),
  MAX_ATTEMPTS: readNumber('WRITER_MAX_ATTEMPTS', 3),
  CLIENT_PROFILE_DIR: process.env.CLIENT_PROFILE_DIR?.trim() || 'clients',
  DEFAULT_CLIENT: process.env.DEFAULT_CLIENT_PROFILE?.trim() || 'default',
};
