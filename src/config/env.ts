import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  projectRoot,

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4.1-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 1024),
    temperature: parseFloat(optional('OPENAI_TEMPERATURE', '0.3')),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 30000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 1024),
    temperature: parseFloat(optional('ANTHROPIC_TEMPERATURE', '0.3')),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 30000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-2.0-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 1024),
    temperature: parseFloat(optional('GEMINI_TEMPERATURE', '0.3')),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 30000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
    routingStrategy: optional('LLM_ROUTING_STRATEGY', 'config'),
    abTestSplit: optionalInt('LLM_AB_TEST_SPLIT', 80),
    // e.g. "DomainQuery:anthropic,Greeting:gemini"
    intentRouting: optional('LLM_INTENT_ROUTING', ''),
  },

  // ───── Conversation Memory ─────
  memory: {
    enabled: optionalBool('MEMORY_ENABLED', true),
    window: optionalInt('MEMORY_WINDOW', 10),
  },

  context: {
    budgetChars: optionalInt('CONTEXT_BUDGET_CHARS', 6000),
    historyCount: optionalInt('CONTEXT_HISTORY_COUNT', 10),
  },

  routing: {
    configPath: optional('ROUTING_CONFIG_PATH', path.join(projectRoot, 'config', 'routing.yaml')),
  },

  // ───── Record-system connectors ─────
  connectors: {
    timeoutMs: optionalInt('CONNECTOR_TIMEOUT_MS', 5000),
    maxRetries: optionalInt('CONNECTOR_MAX_RETRIES', 1),
    retryBackoffMs: optionalInt('CONNECTOR_RETRY_BACKOFF_MS', 500),
  },

  vtiger: {
    baseUrl: optional('VTIGER_URL', ''),
    username: optional('VTIGER_USERNAME', ''),
    accessKey: optional('VTIGER_ACCESS_KEY', ''),
  },

  mautic: {
    baseUrl: optional('MAUTIC_URL', ''),
    username: optional('MAUTIC_USERNAME', ''),
    password: optional('MAUTIC_PASSWORD', ''),
  },

  orchestrator: {
    requestTimeoutMs: optionalInt('REQUEST_TIMEOUT_MS', 45000),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;
