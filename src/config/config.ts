import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../core/utils/errors';
import { LOG_LEVELS } from '../core/utils/Logger';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform((v) => v === '1' || v === 'true');

const runtimeConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  JIRA_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  JIRA_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(5),
  JIRA_RETRY_BASE_DELAY_S: z.coerce.number().nonnegative().default(45),
  JIRA_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  AUDIT_ENABLED: flag,
  AUDIT_LOG_FILE: z.string().min(1).default('logs/audit.log'),
  AUDIT_HMAC_KEY: z.string().min(1).optional(),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

/**
 * Charge .env puis valide les variables d'exécution.
 * @throws ConfigurationError si une variable est invalide
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env, loadDotenv = true): RuntimeConfig {
  if (loadDotenv) {
    dotenv.config();
  }
  // Une variable vide vaut "non définie"
  const defined = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = runtimeConfigSchema.safeParse(defined);

  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Configuration invalide : ${details}`);
  }
  return parsed.data;
}
