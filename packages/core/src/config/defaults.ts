import { createChatTurn, type ChatTurn } from '../entities/session';

/** Vector store matches below this cosine similarity are dropped. */
export const SIMILARITY_THRESHOLD = 0.7;

/** Every session's history starts with this turn. */
export const BASE_GREETING: ChatTurn = createChatTurn('assistant', 'How can I help you?');

export const AGENT_DEFAULTS = {
  MAX_TOOL_ITERATIONS : 3,
  LLM_TIMEOUT_MS      : 20_000,
  TOOL_TIMEOUT_MS     : 12_000,
  CONNECT_TIMEOUT_MS  : 5_000,
  RETRIEVAL_TOP_K     : 5,
  SYSTEM_PROMPT       : [
    'You are a helpful airport concierge.',
    'Use the search_amenities tool to look up shops, restaurants and services before answering questions about them.',
    '{% if identity %}The traveller is signed in with {{ identity.provider }}.{% else %}The traveller is browsing anonymously.{% endif %}',
    'Answer concisely and only recommend amenities the tool returned.'
  ].join('\n')
} as const;

export const SESSION_DEFAULTS = {
  COOKIE_NAME       : 'concierge.sid',
  SHUTDOWN_GRACE_MS : 5_000
} as const;

export const LOGGING_DEFAULTS = {
  LEVEL : 'info'
} as const;
