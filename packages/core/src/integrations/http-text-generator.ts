/**
 * @module integrations/http-text-generator
 * TextGenerator for OpenAI-compatible chat completion endpoints.
 */

import { z } from 'zod';
import type { GenerateOptions, TextGenerator } from '../collaborators.js';
import { BackendUnavailableError, ConfigError, errorMessage } from '../errors.js';

const CompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string() }),
  })).min(1),
});

export interface HttpTextGeneratorOptions {
  endpoint: string;
  model: string;
  apiKey: string;
  /** Custom fetch, e.g. for tests. Default: global fetch. */
  fetchImpl?: typeof fetch;
}

export class HttpTextGenerator implements TextGenerator {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTextGeneratorOptions) {
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Build from configuration, reading the key from the named variable.
   * @throws {ConfigError} when the variable is unset
   */
  static fromEnv(
    config: { endpoint: string; model: string; apiKeyEnv: string },
    env: Record<string, string | undefined> = process.env,
  ): HttpTextGenerator {
    const apiKey = env[config.apiKeyEnv];
    if (!apiKey) {
      throw new ConfigError(`Environment variable ${config.apiKeyEnv} is not set`, { apiKeyEnv: config.apiKeyEnv });
    }
    return new HttpTextGenerator({ endpoint: config.endpoint, model: config.model, apiKey });
  }

  async generate(prompt: string, temperature: number, options: GenerateOptions = {}): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          temperature,
          messages: [{ role: 'user', content: prompt }],
        }),
        signal: options.signal,
      });
    } catch (err) {
      throw new BackendUnavailableError(`Generator request failed: ${errorMessage(err)}`, { endpoint: this.endpoint });
    }

    if (!response.ok) {
      throw new BackendUnavailableError(`Generator returned ${response.status}: ${response.statusText}`, {
        endpoint: this.endpoint,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new BackendUnavailableError(`Generator response is not JSON: ${errorMessage(err)}`, { endpoint: this.endpoint });
    }

    const parsed = CompletionSchema.safeParse(body);
    const first = parsed.success ? parsed.data.choices[0] : undefined;
    if (!first) {
      throw new BackendUnavailableError('Generator response has no completion', { endpoint: this.endpoint });
    }
    return first.message.content;
  }
}
