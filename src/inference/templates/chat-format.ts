/**
 * Chat Format
 *
 * Builds model-family prompts from a PromptSpec by looking the family up in
 * TEMPLATE_TABLE. Pure: no state, no I/O.
 *
 * @module inference/templates/chat-format
 */

import { ERROR_CODES, createCadenceError } from '../../errors/cadence-error.js';
import { trace } from '../../debug/trace.js';
import { TEMPLATE_TABLE } from './table.js';
import {
  TEMPLATE_FAMILIES,
  type PromptSpec,
  type TemplateDefinition,
  type TemplateFamily,
  type Turn,
} from './types.js';

/**
 * Ordered model-name patterns. First match wins, so more specific names
 * (llama-3, dolphin) come before the generic ones they contain.
 */
const FAMILY_NAME_PATTERNS: ReadonlyArray<readonly [RegExp, TemplateFamily]> = [
  [/llama[-_ .]?3/, 'llama3'],
  [/chatml|qwen|dolphin|hermes|(^|[^a-z])yi[-_]/, 'chatml'],
  [/mistral|mixtral/, 'mistral'],
  [/gemma/, 'gemma'],
  [/(^|[^a-z])phi/, 'phi'],
  [/alpaca|vicuna/, 'alpaca'],
  [/llama/, 'llama'],
];

export function isTemplateFamily(value: string): value is TemplateFamily {
  return TEMPLATE_FAMILIES.some((family) => family === value);
}

export function listTemplateFamilies(): TemplateFamily[] {
  return [...TEMPLATE_FAMILIES];
}

/**
 * Resolve a family name case-insensitively ('chatML' -> 'chatml').
 * Throws a configuration error for anything not in the table.
 */
export function resolveTemplateFamily(name: string): TemplateFamily {
  const normalized = name.trim().toLowerCase();
  if (isTemplateFamily(normalized)) return normalized;
  throw createCadenceError(
    ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN,
    `Unknown template family: ${name}`,
    { details: { family: name, known: [...TEMPLATE_FAMILIES] } }
  );
}

export function getTemplateDefinition(family: string): TemplateDefinition {
  return TEMPLATE_TABLE[resolveTemplateFamily(family)];
}

export function getTemplateStopSequence(family: string): string {
  return getTemplateDefinition(family).stopSequence;
}

/**
 * Guess the template family from a model identifier or file name.
 *
 * @returns The family, or null when nothing matches
 */
export function detectTemplateFamily(modelName: string): TemplateFamily | null {
  const name = modelName.toLowerCase();
  for (const [pattern, family] of FAMILY_NAME_PATTERNS) {
    if (pattern.test(name)) return family;
  }
  return null;
}

function wrap(text: string, wrapper: { open: string; close: string }): string {
  return `${wrapper.open}${text}${wrapper.close}`;
}

/**
 * Build the prompt text for a spec.
 *
 * Order: prefix, system block, history turns, final user message, then the
 * assistant cue with no closing token.
 */
export function buildPrompt(spec: PromptSpec): string {
  const template = getTemplateDefinition(spec.family);
  const history: readonly Turn[] = spec.history ?? [];
  const systemPrompt = spec.systemPrompt ? spec.systemPrompt : '';

  const parts: string[] = [template.prefix];

  // Families without a system role get it merged into the first user message
  let pendingSystem = '';
  if (systemPrompt) {
    if (template.system) {
      parts.push(wrap(systemPrompt, template.system));
    } else {
      pendingSystem = systemPrompt;
    }
  }

  const withSystem = (content: string): string => {
    if (!pendingSystem) return content;
    const merged = `${pendingSystem}\n\n${content}`;
    pendingSystem = '';
    return merged;
  };

  for (const turn of history) {
    parts.push(wrap(withSystem(turn.user), template.user));
    parts.push(wrap(turn.assistant, template.assistant));
  }

  parts.push(wrap(withSystem(spec.userMessage), template.user));
  parts.push(template.generationCue);

  const prompt = parts.join('');
  trace.template(`${spec.family}: ${history.length} turns, ${prompt.length} chars`);
  return prompt;
}
