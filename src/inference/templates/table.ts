/**
 * Template Table
 *
 * Control tokens per model family. These must match the formatting each
 * family saw in training byte for byte; add a family by adding a row.
 *
 * @module inference/templates/table
 */

import type { TemplateDefinition, TemplateFamily } from './types.js';

export const TEMPLATE_TABLE: Readonly<Record<TemplateFamily, TemplateDefinition>> = {
  llama: {
    prefix: '[INST] ',
    system: { open: '<<SYS>>\n', close: '\n<</SYS>>\n\n' },
    user: { open: '', close: ' [/INST]' },
    assistant: { open: ' ', close: '</s><s>[INST] ' },
    generationCue: '',
    stopSequence: '</s>',
  },
  llama3: {
    prefix: '<|begin_of_text|>',
    system: { open: '<|start_header_id|>system<|end_header_id|>\n\n', close: '<|eot_id|>' },
    user: { open: '<|start_header_id|>user<|end_header_id|>\n\n', close: '<|eot_id|>' },
    assistant: { open: '<|start_header_id|>assistant<|end_header_id|>\n\n', close: '<|eot_id|>' },
    generationCue: '<|start_header_id|>assistant<|end_header_id|>\n\n',
    stopSequence: '<|eot_id|>',
  },
  alpaca: {
    prefix: '',
    system: { open: '', close: '\n\n' },
    user: { open: '### Instruction:\n', close: '\n\n' },
    assistant: { open: '### Response:\n', close: '\n\n' },
    generationCue: '### Response:\n',
    stopSequence: '###',
  },
  chatml: {
    prefix: '',
    system: { open: '<|im_start|>system\n', close: '<|im_end|>\n' },
    user: { open: '<|im_start|>user\n', close: '<|im_end|>\n' },
    assistant: { open: '<|im_start|>assistant\n', close: '<|im_end|>\n' },
    generationCue: '<|im_start|>assistant\n',
    stopSequence: '<|im_end|>',
  },
  mistral: {
    prefix: '',
    system: null,
    user: { open: '[INST] ', close: ' [/INST]' },
    assistant: { open: '', close: '</s> ' },
    generationCue: '',
    stopSequence: '</s>',
  },
  phi: {
    prefix: '',
    system: { open: '<|system|>\n', close: '<|end|>\n' },
    user: { open: '<|user|>\n', close: '<|end|>\n' },
    assistant: { open: '<|assistant|>\n', close: '<|end|>\n' },
    generationCue: '<|assistant|>\n',
    stopSequence: '<|end|>',
  },
  gemma: {
    prefix: '',
    system: null,
    user: { open: '<start_of_turn>user\n', close: '<end_of_turn>\n' },
    assistant: { open: '<start_of_turn>model\n', close: '<end_of_turn>\n' },
    generationCue: '<start_of_turn>model\n',
    stopSequence: '<end_of_turn>',
  },
};
