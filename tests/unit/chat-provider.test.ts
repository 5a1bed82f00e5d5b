import { beforeEach, describe, expect, it } from 'vitest';

import { createChatProvider, toPromptSpec } from '../../src/client/chat-provider.js';
import { GenerationPipeline } from '../../src/inference/pipeline.js';
import { ERROR_CODES, isCadenceError } from '../../src/errors/cadence-error.js';
import { setLogLevel } from '../../src/debug/index.js';
import { ScriptedEngine, collect } from '../helpers/scripted-engine.js';

const PLATFORM = { cpuCount: 4, constrained: false };

describe('toPromptSpec', () => {
  it('folds system, history and the final user message', () => {
    const spec = toPromptSpec(
      [
        { role: 'system', content: 'Be terse.' },
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
        { role: 'user', content: 'c' },
      ],
      'chatml'
    );
    expect(spec).toEqual({
      family: 'chatml',
      systemPrompt: 'Be terse.',
      userMessage: 'c',
      history: [{ user: 'a', assistant: 'b' }],
    });
  });

  it('pairs an unanswered user message with an empty reply', () => {
    const spec = toPromptSpec(
      [
        { role: 'user', content: 'first' },
        { role: 'user', content: 'second' },
      ],
      'gemma'
    );
    expect(spec.history).toEqual([{ user: 'first', assistant: '' }]);
    expect(spec.systemPrompt).toBeNull();
  });

  it('leaves history unset when there are no earlier exchanges', () => {
    const spec = toPromptSpec([{ role: 'user', content: 'only' }], 'chatml');
    expect(spec.history).toBeUndefined();
  });

  it('requires a user message', () => {
    let caught: unknown;
    try {
      toPromptSpec([{ role: 'system', content: 'only system' }], 'chatml');
    } catch (error) {
      caught = error;
    }
    expect(isCadenceError(caught, ERROR_CODES.INVALID_ARGUMENT)).toBe(true);
  });
});

describe('createChatProvider', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  it('answers a chat with the pipeline family', async () => {
    const engine = new ScriptedEngine(['Hi', '!']);
    const pipeline = new GenerationPipeline(engine, { family: 'chatml', platform: PLATFORM });
    const provider = createChatProvider(pipeline);

    const response = await provider.chat([{ role: 'user', content: 'Hello' }]);

    expect(response.content).toBe('Hi!');
    expect(response.stopReason).toBe('endOfSequence');
    expect(response.usage.completionChars).toBe(3);
    expect(response.usage.fragments).toBe(2);
    expect(response.usage.promptChars).toBe(engine.calls[0]?.prompt.length);
    expect(pipeline.session.size).toBe(0);
  });

  it('streams deltas and records the session when asked', async () => {
    const engine = new ScriptedEngine(['one ', 'two<end_of_turn>', 'three']);
    const pipeline = new GenerationPipeline(engine, { platform: PLATFORM });
    const provider = createChatProvider(pipeline, { family: 'gemma', session: true });

    const deltas = await collect(provider.stream([{ role: 'user', content: 'count' }]));

    expect(deltas).toEqual(['one ', 'two']);
    expect(pipeline.session.turns).toEqual([{ user: 'count', assistant: 'one two' }]);
  });

  it('feeds recorded exchanges into the next chat', async () => {
    const engine = new ScriptedEngine(['ok']);
    const pipeline = new GenerationPipeline(engine, { family: 'chatml', platform: PLATFORM });
    const provider = createChatProvider(pipeline, { session: true });

    await provider.chat([{ role: 'user', content: 'first' }]);
    const second = await provider.chat([{ role: 'user', content: 'second' }]);

    expect(pipeline.session.size).toBe(2);
    expect(second.usage.promptChars).toBe(engine.calls[1]?.prompt.length);
    expect(engine.calls[1]?.prompt).toBe(
      '<|im_start|>user\nfirst<|im_end|>\n' +
        '<|im_start|>assistant\nok<|im_end|>\n' +
        '<|im_start|>user\nsecond<|im_end|>\n' +
        '<|im_start|>assistant\n'
    );
  });

  it('needs a family from somewhere', () => {
    const pipeline = new GenerationPipeline(new ScriptedEngine([]), { platform: PLATFORM });
    const provider = createChatProvider(pipeline);

    let caught: unknown;
    try {
      provider.stream([{ role: 'user', content: 'x' }]);
    } catch (error) {
      caught = error;
    }
    expect(isCadenceError(caught, ERROR_CODES.CONFIG_TEMPLATE_UNKNOWN)).toBe(true);
  });
});
