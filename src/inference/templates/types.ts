/**
 * Template Types
 *
 * @module inference/templates/types
 */

export const TEMPLATE_FAMILIES = [
  'llama',
  'llama3',
  'alpaca',
  'chatml',
  'mistral',
  'phi',
  'gemma',
] as const;

export type TemplateFamily = (typeof TEMPLATE_FAMILIES)[number];

/**
 * One completed (user, assistant) exchange.
 */
export interface Turn {
  readonly user: string;
  readonly assistant: string;
}

/**
 * Conversation context for one generation request.
 */
export interface PromptSpec {
  /** Family name, matched case-insensitively ('chatML'); unknown names are a configuration error */
  family: TemplateFamily | string;
  /** Omitted, null or empty means no system block */
  systemPrompt?: string | null;
  userMessage: string;
  /** Explicit history; when absent the pipeline may use session memory */
  history?: readonly Turn[];
}

/** Opening and closing control tokens around one block of text */
export interface TokenWrapper {
  readonly open: string;
  readonly close: string;
}

/**
 * Control-token table row for one model family.
 */
export interface TemplateDefinition {
  /** Emitted once before everything else */
  readonly prefix: string;
  /** Null when the family has no system role; the system text then joins the first user message */
  readonly system: TokenWrapper | null;
  readonly user: TokenWrapper;
  readonly assistant: TokenWrapper;
  /** Appended after the final user message; generation continues from here */
  readonly generationCue: string;
  /** Marker the model emits at the end of its turn */
  readonly stopSequence: string;
}
