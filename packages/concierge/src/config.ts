import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { AGENT_DEFAULTS, ConfigurationError, LOGGING_DEFAULTS, SESSION_DEFAULTS } from '@concierge/core';

const DEFAULT_DATASET = fileURLToPath(new URL('../data/amenities.json', import.meta.url));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT                     : positiveInt(8081),
  CLIENT_ID                : z.string().optional(),
  SESSION_SECRET           : z.string(),
  NODE_ENV                 : z.string().default('development'),
  OPENAI_API_KEY           : z.string(),
  OPENAI_BASE_URL          : z.string().url().optional(),
  OPENAI_MODEL             : z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL   : z.string().default('text-embedding-3-small'),
  KNOWLEDGE_SERVICE_URL    : z.string().url().optional(),
  AMENITY_DATASET          : z.string().default(DEFAULT_DATASET),
  IDENTITY_PROVIDERS       : z.string().default('google'),
  LOG_LEVEL                : z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default(LOGGING_DEFAULTS.LEVEL),
  LOG_PRETTY               : flag.optional(),
  LLM_TIMEOUT_MS           : positiveInt(AGENT_DEFAULTS.LLM_TIMEOUT_MS),
  TOOL_TIMEOUT_MS          : positiveInt(AGENT_DEFAULTS.TOOL_TIMEOUT_MS),
  AGENT_CONNECT_TIMEOUT_MS : positiveInt(AGENT_DEFAULTS.CONNECT_TIMEOUT_MS),
  MAX_TOOL_ITERATIONS      : positiveInt(AGENT_DEFAULTS.MAX_TOOL_ITERATIONS),
  SHUTDOWN_GRACE_MS        : positiveInt(SESSION_DEFAULTS.SHUTDOWN_GRACE_MS)
});

type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface ConciergeConfig {
  port               : number;
  clientId           : string | undefined;
  sessionSecret      : string;
  secureCookies      : boolean;
  openai             : {
    apiKey         : string;
    baseUrl        : string | undefined;
    model          : string;
    embeddingModel : string;
  };
  knowledgeServiceUrl: string | undefined;
  amenityDataset     : string;
  identityProviders  : string[];
  logging            : {
    level  : LogLevel;
    pretty : boolean;
  };
  agent              : {
    llmTimeoutMs      : number;
    toolTimeoutMs     : number;
    connectTimeoutMs  : number;
    maxToolIterations : number;
  };
  shutdownGraceMs    : number;
}

/**
 * Reads the process environment into a typed config. Empty variables count
 * as unset; every offending variable is listed in the thrown error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConciergeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const production = vars.NODE_ENV === 'production';
  const identityProviders = vars.IDENTITY_PROVIDERS
    .split(',')
    .map((provider) => provider.trim())
    .filter(Boolean);

  return {
    port                : vars.PORT,
    clientId            : vars.CLIENT_ID,
    sessionSecret       : vars.SESSION_SECRET,
    secureCookies       : production,
    openai              : {
      apiKey         : vars.OPENAI_API_KEY,
      baseUrl        : vars.OPENAI_BASE_URL,
      model          : vars.OPENAI_MODEL,
      embeddingModel : vars.OPENAI_EMBEDDING_MODEL
    },
    knowledgeServiceUrl : vars.KNOWLEDGE_SERVICE_URL,
    amenityDataset      : vars.AMENITY_DATASET,
    identityProviders,
    logging             : {
      level  : vars.LOG_LEVEL,
      pretty : vars.LOG_PRETTY ?? !production
    },
    agent               : {
      llmTimeoutMs      : vars.LLM_TIMEOUT_MS,
      toolTimeoutMs     : vars.TOOL_TIMEOUT_MS,
      connectTimeoutMs  : vars.AGENT_CONNECT_TIMEOUT_MS,
      maxToolIterations : vars.MAX_TOOL_ITERATIONS
    },
    shutdownGraceMs     : vars.SHUTDOWN_GRACE_MS
  };
}
