import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../services/errors.js';
import { SqlConfigProfile } from '../types/index.js';

export const DEFAULT_PROFILES_PATH = fileURLToPath(new URL('../../config/sql-profiles.json', import.meta.url));

const credentialSchema = z
  .object({
    username: z.string().min(1).optional(),
    usernameVariable: z.string().min(1).optional(),
    passwordVariable: z.string().min(1).optional(),
    clientIdVariable: z.string().min(1).optional(),
  })
  .strict();

const profileSchema = z.object({
  name: z.string().min(1),
  title: z.string(),
  description: z.string(),
  server: z.string().min(1),
  port: z.number().int().positive().default(1433),
  database: z.string().min(1),
  authMode: z.enum(['password', 'interactive-ad', 'managed-identity']),
  encrypt: z.boolean(),
  trustServerCertificate: z.boolean(),
  timeoutSeconds: z.number().positive(),
  credential: credentialSchema.default({}),
});

const profileFileSchema = z.object({
  defaultProfile: z.string().min(1),
  profiles: z.array(profileSchema).min(1),
});

export interface SqlProfileSet {
  defaultProfile: string;
  profiles: SqlConfigProfile[];
}

export function parseSqlProfiles(raw: unknown): SqlProfileSet {
  const parsed = profileFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid SQL profile definitions: ${problems}`);
  }
  return parsed.data;
}

export function loadSqlProfiles(path: string = DEFAULT_PROFILES_PATH): SqlProfileSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read SQL profiles from ${path}: ${getErrorMessage(error)}`, { cause: error });
  }
  return parseSqlProfiles(raw);
}
