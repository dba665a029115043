export type ChatRole = 'assistant' | 'user';

export interface ChatTurn {
  readonly role: ChatRole;
  readonly content: string;
}

export function createChatTurn(role: ChatRole, content: string): ChatTurn {
  return Object.freeze({ role, content });
}
