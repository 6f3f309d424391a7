import axios, { AxiosInstance } from 'axios';
import { IClassifierProvider, NormalizedClassification } from '../../../core/interfaces/IClassifierProvider';
import { ProviderFailure } from '../../../utils/errors';
import {
  buildClassificationPrompt,
  normalizeClassificationPayload,
  parseModelJson,
  SYSTEM_PROMPT
} from './classification';

export interface OllamaProviderConfig {
  name: string;
  host: string;
  model: string;
  temperature: number;
}

export interface GenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
  };
}

export const DEFAULT_OLLAMA_CONFIG: OllamaProviderConfig = {
  name: 'ollama',
  host: 'http://localhost:11434',
  model: 'llama3.2:3b',
  temperature: 0.1
};

/**
 * Local model served by Ollama's /api/generate.
 */
export class OllamaProvider implements IClassifierProvider {
  readonly name: string;
  private config: OllamaProviderConfig;
  private http: AxiosInstance;

  constructor(config: Partial<OllamaProviderConfig> = {}, http: AxiosInstance = axios.create()) {
    this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    this.config.host = this.config.host.replace(/\/$/, '');
    this.name = this.config.name;
    this.http = http;
  }

  async classify(text: string, signal: AbortSignal): Promise<unknown> {
    const request: GenerateRequest = {
      model: this.config.model,
      prompt: buildClassificationPrompt(text),
      system: SYSTEM_PROMPT,
      stream: false,
      format: 'json',
      options: { temperature: this.config.temperature }
    };

    try {
      const response = await this.http.post<unknown>(`${this.config.host}/api/generate`, request, {
        signal,
        headers: { 'Content-Type': 'application/json' }
      });

      if (response.status < 200 || response.status >= 300) {
        throw new ProviderFailure(this.name, `HTTP ${response.status}`);
      }

      return response.data;
    } catch (error) {
      if (error instanceof ProviderFailure) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNREFUSED') {
          throw new ProviderFailure(this.name, 'Ollama service is not running', error);
        }
        if (error.response?.status === 404) {
          throw new ProviderFailure(this.name, `Model not found: ${this.config.model}`, error);
        }
      }
      throw new ProviderFailure(this.name, `request failed: ${String(error)}`, error);
    }
  }

  normalize(raw: unknown): NormalizedClassification {
    if (typeof raw !== 'object' || raw === null || !('response' in raw) || typeof raw.response !== 'string') {
      throw new ProviderFailure(this.name, 'generate payload has no response text');
    }
    return normalizeClassificationPayload(parseModelJson(raw.response, this.name), this.name);
  }
}
