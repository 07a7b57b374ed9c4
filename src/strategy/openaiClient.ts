import { EngineConfig } from '../core/types';
import { ProviderError, isRetryableStatus } from '../core/errors';
import { errorMessage } from '../core/utils';
import { AdvisorClient } from './advisor.types';

type AdvisorSettings = Pick<EngineConfig['advisor'], 'model' | 'baseUrl' | 'temperature' | 'maxTokens'>;

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

const isChatCompletion = (value: unknown): value is ChatCompletionResponse =>
  typeof value === 'object' && value !== null && (!('choices' in value) || Array.isArray(value.choices));

export class OpenAIAdvisorClient implements AdvisorClient {
  private apiKey: string;
  private settings: AdvisorSettings;

  constructor(apiKey: string, settings: AdvisorSettings) {
    this.apiKey = apiKey;
    this.settings = settings;
  }

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    let resp: Response;
    try {
      resp = await fetch(`${this.settings.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.settings.model,
          messages: [
            {
              role: 'user',
              content: prompt
            }
          ],
          temperature: this.settings.temperature,
          max_tokens: this.settings.maxTokens,
          response_format: { type: 'json_object' }
        }),
        signal
      });
    } catch (err) {
      // network failure or abort
      throw new ProviderError(`Advisor request failed: ${errorMessage(err)}`, { retryable: true, cause: err });
    }
    if (!resp.ok) {
      const text = await resp.text();
      throw new ProviderError(`Advisor error ${resp.status}: ${text.slice(0, 300)}`, {
        retryable: isRetryableStatus(resp.status),
        status: resp.status
      });
    }
    const json: unknown = await resp.json();
    const content = isChatCompletion(json) ? json.choices?.[0]?.message?.content : undefined;
    if (!content) {
      throw new ProviderError('Advisor returned empty content', { retryable: true, status: resp.status });
    }
    return content;
  }
}

export const getAdvisorClient = (
  settings: AdvisorSettings,
  env: NodeJS.ProcessEnv = process.env
): AdvisorClient | null => {
  const key = env.LLM_API_KEY || env.OPENAI_API_KEY;
  if (!key) return null;
  if (env.USE_REAL_LLM?.toLowerCase() === 'true') {
    return new OpenAIAdvisorClient(key, settings);
  }
  return null;
};
