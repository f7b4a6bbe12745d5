import { describe, it, expect } from 'vitest';
import { HttpTextGenerator } from '../../../src/integrations/http-text-generator.js';
import { BackendUnavailableError, ConfigError } from '../../../src/errors.js';

const ENDPOINT = 'http://generator.test/v1/chat/completions';

function generatorReturning(respond: () => Response | Promise<Response>) {
  const requests: Array<{ url: string; init: RequestInit | undefined }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init });
    return respond();
  };
  const generator = new HttpTextGenerator({ endpoint: ENDPOINT, model: 'test-model', apiKey: 'test-secret', fetchImpl });
  return { generator, requests };
}

describe('HttpTextGenerator', () => {
  it('posts a chat completion request and returns the first choice', async () => {
    const { generator, requests } = generatorReturning(() =>
      new Response(JSON.stringify({ choices: [{ message: { content: '{"ok": true}' } }] }), { status: 200 }),
    );

    expect(await generator.generate('propose a fix', 0.2)).toBe('{"ok": true}');

    const request = requests[0];
    expect(request?.url).toBe(ENDPOINT);
    expect(request?.init?.method).toBe('POST');
    expect(new Headers(request?.init?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(request?.init?.body))).toEqual({
      model: 'test-model',
      temperature: 0.2,
      messages: [{ role: 'user', content: 'propose a fix' }],
    });
  });

  it('reports HTTP errors', async () => {
    const { generator } = generatorReturning(() => new Response('busy', { status: 503, statusText: 'Service Unavailable' }));
    await expect(generator.generate('x', 0)).rejects.toThrow('Generator returned 503: Service Unavailable');
  });

  it('reports bodies that are not completions', async () => {
    const notJson = generatorReturning(() => new Response('<html>', { status: 200 }));
    await expect(notJson.generator.generate('x', 0)).rejects.toThrow(/^Generator response is not JSON: /);

    const empty = generatorReturning(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    await expect(empty.generator.generate('x', 0)).rejects.toThrow('Generator response has no completion');
  });

  it('wraps network failures', async () => {
    const { generator } = generatorReturning(() => Promise.reject(new Error('ECONNREFUSED')));
    const error = await generator.generate('x', 0).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({ message: 'Generator request failed: ECONNREFUSED' });
  });

  it('reads its key from the environment', () => {
    const config = { endpoint: ENDPOINT, model: 'test-model', apiKeyEnv: 'MENDGRAPH_API_KEY' };
    expect(() => HttpTextGenerator.fromEnv(config, {})).toThrow(ConfigError);
    expect(() => HttpTextGenerator.fromEnv(config, {})).toThrow('Environment variable MENDGRAPH_API_KEY is not set');
    expect(HttpTextGenerator.fromEnv(config, { MENDGRAPH_API_KEY: 'test-secret' })).toBeInstanceOf(HttpTextGenerator);
  });
});
