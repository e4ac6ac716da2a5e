import { z } from 'zod';

export const DEFAULT_OPEN_FILE_LIMIT = 32;

const openFileLimitSchema = z.coerce.number().int().positive();

/**
 * Parse the open file limit from CACHED_FS_MAX_OPEN_FILES
 * @returns Number of files that may be open at once, or undefined if not set or invalid
 */
export const parseOpenFileLimit = (env: NodeJS.ProcessEnv = process.env): number | undefined => {
  const envValue = env.CACHED_FS_MAX_OPEN_FILES?.trim();
  if (!envValue) {
    return undefined;
  }

  const parsed = openFileLimitSchema.safeParse(envValue);
  return parsed.success ? parsed.data : undefined;
};
