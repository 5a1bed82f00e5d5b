/**
 * Template Engine exports.
 *
 * @module inference/templates
 */

export {
  buildPrompt,
  detectTemplateFamily,
  getTemplateDefinition,
  getTemplateStopSequence,
  isTemplateFamily,
  listTemplateFamilies,
  resolveTemplateFamily,
} from './chat-format.js';
export { TEMPLATE_TABLE } from './table.js';
export { TEMPLATE_FAMILIES } from './types.js';
export type {
  PromptSpec,
  TemplateDefinition,
  TemplateFamily,
  TokenWrapper,
  Turn,
} from './types.js';
