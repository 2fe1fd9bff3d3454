import { GenerationError, errorMessage, type GenerationFailureKind } from '@autodialer/domain';

export interface GeminiClientOptions {
  /** Candidate model identifiers, tried in order. */
  models: string[];
  baseUrl?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface GeminiResult {
  text: string;
  model: string;
}

interface GenerateContentResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  error?: { code?: number; message?: string; status?: string };
}

const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';

export function classifyGeminiFailure(status: number, body: string): GenerationFailureKind {
  if (status === 404) {
    return 'model_not_found';
  }
  if (status === 400 && /not found|not supported/i.test(body)) {
    return 'model_not_found';
  }
  if (status === 429) {
    return 'quota_exceeded';
  }
  if (status === 401 || status === 403) {
    return 'unauthorized';
  }
  return 'transient';
}

export class GeminiClient {
  private readonly models: string[];
  private readonly baseUrl: string;
  private activeIndex = 0;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: GeminiClientOptions
  ) {
    this.models = options.models.map((model) => model.trim()).filter(Boolean);
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey) && this.models.length > 0;
  }

  activeModel(): string | undefined {
    return this.models[this.activeIndex];
  }

  /**
   * Generates text with the active model, falling through the candidate list
   * only while models report as unknown. Any other failure ends the attempt.
   */
  async generate(prompt: string): Promise<GeminiResult> {
    if (!this.isConfigured()) {
      throw new GenerationError('unauthorized', 'gemini_not_configured');
    }

    const tried: string[] = [];
    for (let index = this.activeIndex; index < this.models.length; index += 1) {
      const model = this.models[index];
      try {
        const text = await this.generateWith(model, prompt);
        this.activeIndex = index;
        return { text, model };
      } catch (error) {
        if (error instanceof GenerationError && error.kind === 'model_not_found') {
          tried.push(model);
          continue;
        }
        throw error;
      }
    }

    throw new GenerationError('models_exhausted', `no_available_model:${tried.join(',')}`);
  }

  private async generateWith(model: string, prompt: string): Promise<string> {
    const modelPath = model.startsWith('models/') ? model : `models/${model}`;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/v1beta/${modelPath}:generateContent`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey ?? ''
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: this.options.temperature ?? 0.7,
            maxOutputTokens: this.options.maxOutputTokens ?? 4096
          }
        })
      });
    } catch (error) {
      throw new GenerationError('transient', `gemini_network_error:${errorMessage(error)}`, model, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text();
      const kind = classifyGeminiFailure(res.status, body);
      throw new GenerationError(kind, `gemini_http_${res.status}:${body.slice(0, 200)}`, model);
    }

    const body = (await res.json()) as GenerateContentResponse;
    const text = (body.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
      .trim();

    if (!text) {
      throw new GenerationError('empty_response', 'gemini_empty_response', model);
    }

    return text;
  }
}
