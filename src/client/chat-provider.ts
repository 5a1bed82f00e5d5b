/**
 * Chat Provider
 *
 * Role-tagged chat message interface over a GenerationPipeline, for callers
 * that hold a message list rather than a PromptSpec.
 *
 * @module client/chat-provider
 */

import { ERROR_CODES, createCadenceError } from '../errors/cadence-error.js';
import type { GenerationPipeline, GenerateOptions } from '../inference/pipeline.js';
import type { StopReason } from '../inference/stop-filter.js';
import type { PromptSpec, TemplateFamily, Turn } from '../inference/templates/types.js';

/**
 * Chat message format
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Chat response format
 */
export interface ChatResponse {
  content: string;
  stopReason: StopReason;
  usage: {
    promptChars: number;
    completionChars: number;
    fragments: number;
  };
}

export interface ChatProviderOptions {
  /** Template family; defaults to the pipeline's configured family */
  family?: TemplateFamily;
  /** Record completed exchanges in the pipeline's session memory */
  session?: boolean;
}

export interface ChatProvider {
  chat(messages: readonly ChatMessage[], options?: GenerateOptions): Promise<ChatResponse>;
  stream(messages: readonly ChatMessage[], options?: GenerateOptions): AsyncGenerator<string, void, undefined>;
}

/**
 * Fold a message list into a PromptSpec.
 *
 * System messages join into the system prompt, the last user message becomes
 * the request, and earlier user messages pair with the assistant reply that
 * follows them. A user message with no reply pairs with an empty one;
 * consecutive assistant messages are joined. Without earlier exchanges the
 * spec has no history, so a session-enabled pipeline uses its session window.
 */
export function toPromptSpec(messages: readonly ChatMessage[], family: TemplateFamily): PromptSpec {
  let lastUser = -1;
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i]?.role === 'user') {
      lastUser = i;
      break;
    }
  }
  const finalMessage = messages[lastUser];
  if (!finalMessage) {
    throw createCadenceError(ERROR_CODES.INVALID_ARGUMENT, 'Chat requires at least one user message');
  }

  const system: string[] = [];
  const history: Turn[] = [];
  let pendingUser: string | null = null;
  let pendingAssistant: string[] = [];

  const flush = (): void => {
    if (pendingUser === null && pendingAssistant.length === 0) return;
    history.push({ user: pendingUser ?? '', assistant: pendingAssistant.join('\n') });
    pendingUser = null;
    pendingAssistant = [];
  };

  messages.forEach((message, index) => {
    if (message.role === 'system') {
      system.push(message.content);
    } else if (index < lastUser) {
      if (message.role === 'user') {
        flush();
        pendingUser = message.content;
      } else {
        pendingAssistant.push(message.content);
      }
    }
  });
  flush();

  return {
    family,
    systemPrompt: system.length ? system.join('\n\n') : null,
    userMessage: finalMessage.content,
    history: history.length ? history : undefined,
  };
}

/**
 * Create a chat provider bound to a pipeline.
 */
export function createChatProvider(
  pipeline: GenerationPipeline,
  providerOptions: ChatProviderOptions = {}
): ChatProvider {
  const resolveFamily = (): TemplateFamily => {
    const family = providerOptions.family ?? pipeline.config.family;
    if (!family) {
      throw createCadenceError(
        ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN,
        'No template family: pass one to createChatProvider or configure the pipeline family'
      );
    }
    return family;
  };

  const withSession = (options: GenerateOptions = {}): GenerateOptions => ({
    session: providerOptions.session ?? false,
    ...options,
  });

  return {
    async chat(messages, options) {
      const spec = toPromptSpec(messages, resolveFamily());
      const generateOptions = withSession(options);
      const promptChars = pipeline.buildPrompt(spec, { session: generateOptions.session }).length;
      const result = await pipeline.complete(spec, generateOptions);
      return {
        content: result.text,
        stopReason: result.stopReason,
        usage: {
          promptChars,
          completionChars: result.emittedLength,
          fragments: result.fragments,
        },
      };
    },

    stream(messages, options) {
      return pipeline.generate(toPromptSpec(messages, resolveFamily()), withSession(options));
    },
  };
}
