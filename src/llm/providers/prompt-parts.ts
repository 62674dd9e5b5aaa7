import { LLMMessage } from '../types';

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface PromptParts {
  /** All system messages, joined */
  system: string;
  /** Strictly alternating, starting with a user turn */
  turns: ChatTurn[];
}

/**
 * Split pipeline messages into the shape providers with a separate system
 * parameter expect. Consecutive same-role messages are merged.
 */
export function splitPrompt(messages: LLMMessage[]): PromptParts {
  const system: string[] = [];
  const turns: ChatTurn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
      continue;
    }
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content += `\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  if (turns.length === 0 || turns[0].role !== 'user') {
    turns.unshift({ role: 'user', content: '(no message)' });
  }

  return { system: system.join('\n\n'), turns };
}

export const JSON_ONLY_INSTRUCTION =
  'Respond with one JSON object only. No markdown fences and no text outside the object.';
