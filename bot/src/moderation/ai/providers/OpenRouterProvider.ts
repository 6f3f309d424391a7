import axios, { AxiosInstance } from 'axios';
import { IClassifierProvider, NormalizedClassification } from '../../../core/interfaces/IClassifierProvider';
import { ProviderFailure } from '../../../utils/errors';
import {
  buildClassificationPrompt,
  normalizeClassificationPayload,
  parseModelJson,
  SYSTEM_PROMPT
} from './classification';

export interface OpenRouterProviderConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_OPENROUTER_CONFIG: Omit<OpenRouterProviderConfig, 'apiKey' | 'model'> = {
  name: 'openrouter',
  baseUrl: 'https://openrouter.ai/api/v1',
  maxTokens: 300,
  temperature: 0.1
};

/**
 * OpenAI-style chat completion endpoint (OpenRouter by default).
 */
export class OpenRouterProvider implements IClassifierProvider {
  readonly name: string;
  private config: OpenRouterProviderConfig;
  private http: AxiosInstance;

  constructor(
    config: Partial<OpenRouterProviderConfig> & Pick<OpenRouterProviderConfig, 'apiKey' | 'model'>,
    http: AxiosInstance = axios.create()
  ) {
    this.config = { ...DEFAULT_OPENROUTER_CONFIG, ...config };
    this.config.baseUrl = this.config.baseUrl.replace(/\/$/, '');
    this.name = this.config.name;
    this.http = http;
  }

  async classify(text: string, signal: AbortSignal): Promise<unknown> {
    try {
      const response = await this.http.post<unknown>(
        `${this.config.baseUrl}/chat/completions`,
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildClassificationPrompt(text) }
          ],
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature
        },
        {
          signal,
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json'
          }
        }
      );

      if (response.status < 200 || response.status >= 300) {
        throw new ProviderFailure(this.name, `HTTP ${response.status}`);
      }

      return response.data;
    } catch (error) {
      if (error instanceof ProviderFailure) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new ProviderFailure(this.name, status ? `HTTP ${status}` : error.message, error);
      }
      throw new ProviderFailure(this.name, `request failed: ${String(error)}`, error);
    }
  }

  normalize(raw: unknown): NormalizedClassification {
    return normalizeClassificationPayload(parseModelJson(this.extractContent(raw), this.name), this.name);
  }

  private extractContent(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'choices' in raw && Array.isArray(raw.choices)) {
      const first: unknown = raw.choices[0];
      if (typeof first === 'object' && first !== null && 'message' in first) {
        const message: unknown = first.message;
        if (typeof message === 'object' && message !== null && 'content' in message && typeof message.content === 'string') {
          return message.content;
        }
      }
    }
    throw new ProviderFailure(this.name, 'completion payload has no message content');
  }
}
