import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError } from 'axios';
import { GeminiProvider } from '../GeminiProvider.js';
import { ExternalServiceError } from '../../../types/errors.js';
import { ServiceConfigurationError } from '../../../utils/serviceErrors.js';
import { axiosResponse } from '../../../test/axiosResponse.js';

function createProvider(apiKey = 'test-key') {
  const provider = new GeminiProvider({
    apiKey,
    baseUrl: 'https://gemini.test/v1beta',
    defaultModel: 'gemini-test',
    timeout: 1000,
  });
  const client = axios.create();
  provider.setClient(client);
  const post = vi.spyOn(client, 'post');
  return { provider, post };
}

describe('GeminiProvider', () => {
  it('sends one prompt with the system message first and the key as a query parameter', async () => {
    const { provider, post } = createProvider();
    post.mockResolvedValue(
      axiosResponse({
        candidates: [{ content: { parts: [{ text: ' Hello there \n' }] } }],
        usageMetadata: { promptTokenCount: 7, candidatesTokenCount: 2, totalTokenCount: 9 },
      })
    );

    const response = await provider.generate(
      [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Say hello' },
      ],
      { temperature: 0, max_tokens: 50 }
    );

    expect(post).toHaveBeenCalledWith(
      '/models/gemini-test:generateContent',
      {
        contents: [{ parts: [{ text: 'Be brief.\n\nSay hello' }] }],
        generationConfig: { temperature: 0, maxOutputTokens: 50 },
      },
      { params: { key: 'test-key' }, timeout: 1000 }
    );
    expect(response).toEqual({
      content: 'Hello there',
      model: 'gemini-test',
      usage: { promptTokens: 7, completionTokens: 2, totalTokens: 9 },
    });
  });

  it('uses the model requested per call', async () => {
    const { provider, post } = createProvider();
    post.mockResolvedValue(axiosResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] }));

    await provider.generate([{ role: 'user', content: 'hi' }], { model: 'gemini-other' });

    expect(post.mock.calls[0][0]).toBe('/models/gemini-other:generateContent');
  });

  it('rejects an empty reply', async () => {
    const { provider, post } = createProvider();
    post.mockResolvedValue(axiosResponse({ candidates: [] }));

    await expect(provider.generate([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('reports timeouts as an external service error', async () => {
    const { provider, post } = createProvider();
    post.mockRejectedValue(new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED'));

    await expect(provider.generate([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      /Gemini API call timed out after 1000ms/
    );
  });

  it('reports HTTP failures as an external service error', async () => {
    const { provider, post } = createProvider();
    post.mockRejectedValue(new AxiosError('Request failed', 'ERR_BAD_RESPONSE'));

    await expect(provider.generate([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'External service error (Gemini): Request failed with status unknown'
    );
  });

  it('refuses to call without an API key', async () => {
    const { provider, post } = createProvider('');

    await expect(provider.generate([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(
      ServiceConfigurationError
    );
    expect(post).not.toHaveBeenCalled();
  });
});
