import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import {
  AnthropicLanguageModel, classifyModelError, type MessageRequest, type MessageTransport,
} from '../bridge/language-model.js';
import { TemplateLanguageModel, cannedAnalysis } from '../bridge/template-model.js';
import { buildAnalysisPrompt, buildEmailPrompt } from '../utils/prompts.js';
import { parseAnalysis } from '../utils/analysis-parser.js';
import { ProviderError } from '../types/errors.js';
import { analysisOutput, contactOutput, researchOutput } from './fixtures/stages.js';

function stubTransport(reply: (request: MessageRequest) => Promise<string>) {
  const createMessage = vi.fn((request: MessageRequest, _signal?: AbortSignal) => reply(request));
  const transport: MessageTransport = { createMessage };
  return { transport, createMessage };
}

describe('AnthropicLanguageModel', () => {
  it('sends the prompt with the configured model and default sampling', async () => {
    const { transport, createMessage } = stubTransport(async () => 'Hello');
    const model = new AnthropicLanguageModel({ model: 'test-model', transport });

    expect(await model.complete('Say hello')).toBe('Hello');
    expect(createMessage.mock.calls[0][0]).toEqual({
      model: 'test-model', prompt: 'Say hello', maxTokens: 1024, temperature: 0.7,
    });
  });

  it('passes explicit options and the abort signal through', async () => {
    const { transport, createMessage } = stubTransport(async () => 'ok');
    const model = new AnthropicLanguageModel({ model: 'test-model', transport });
    const controller = new AbortController();

    await model.complete('p', { maxTokens: 2000, temperature: 0.8, signal: controller.signal });

    expect(createMessage.mock.calls[0][0]).toMatchObject({ maxTokens: 2000, temperature: 0.8 });
    expect(createMessage.mock.calls[0][1]).toBe(controller.signal);
  });

  it('treats an empty completion as transient', async () => {
    const { transport } = stubTransport(async () => '');
    const model = new AnthropicLanguageModel({ model: 'test-model', transport });

    const err = await model.complete('p').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ transient: true, provider: 'anthropic' });
  });

  it('classifies transport failures', async () => {
    const { transport } = stubTransport(async () => {
      throw new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined);
    });
    const model = new AnthropicLanguageModel({ model: 'test-model', transport });

    const err = await model.complete('p').catch((e: unknown) => e);
    expect(err).toMatchObject({ transient: false, status: 401 });
  });
});

describe('classifyModelError', () => {
  it.each([
    [429, true],
    [529, true],
    [500, true],
    [409, true],
    [400, false],
    [403, false],
  ])('HTTP %i → transient=%s', (status, transient) => {
    const err = classifyModelError(new Anthropic.APIError(status, undefined, 'boom', undefined));
    expect(err.transient).toBe(transient);
    expect(err.status).toBe(status);
  });

  it('treats connection failures and aborts as transient', () => {
    expect(classifyModelError(new Anthropic.APIConnectionError({ message: 'ECONNRESET' })).transient).toBe(true);
    expect(classifyModelError(new Anthropic.APIUserAbortError()).transient).toBe(true);
  });

  it('treats unknown errors as terminal', () => {
    const err = classifyModelError(new Error('weird'));
    expect(err.transient).toBe(false);
    expect(err.message).toBe('Language model error: weird');
  });

  it('passes ProviderErrors through unchanged', () => {
    const original = new ProviderError('x', 'anthropic', true);
    expect(classifyModelError(original)).toBe(original);
  });
});

describe('TemplateLanguageModel', () => {
  const model = new TemplateLanguageModel();

  it('answers an analysis prompt with parseable sections', async () => {
    const text = await model.complete(buildAnalysisPrompt(researchOutput('Acme')));
    const parsed = parseAnalysis(text);

    expect(text).toBe(cannedAnalysis('Acme'));
    expect(parsed.keyChallenges).toHaveLength(5);
    expect(parsed.opportunities).toHaveLength(4);
    expect(parsed.recommendedApproach).toBe(
      'Emphasize proven ROI in similar enterprise environments. Focus on quick wins and scalability. ' +
      'Lead with technical credibility and case studies from comparable companies.',
    );
  });

  it('answers an email prompt addressed to the contact', async () => {
    const contact = contactOutput().prioritizedContacts[0];
    const text = await model.complete(buildEmailPrompt(contact, analysisOutput(), 'Acme'));

    expect(text.startsWith('Hi Jennifer,')).toBe(true);
    expect(text).toContain('biggest hurdle is scaling infrastructure.');
    expect(text).toContain("I've been following Acme's growth");
  });

  it('falls back to a generic challenge when none were identified', async () => {
    const contact = contactOutput().prioritizedContacts[0];
    const analysis = { ...analysisOutput(), keyChallenges: [] };
    const text = await model.complete(buildEmailPrompt(contact, analysis, 'Acme'));

    expect(text).toContain('biggest hurdle is infrastructure scaling.');
  });

  it('returns a generic reply for other prompts', async () => {
    expect(await model.complete('Company: Acme\nWhat is new?')).toBe(
      'Summary for Acme: no template matches this request.',
    );
  });
});
