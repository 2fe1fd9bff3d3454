import type { ArticleRequest, GeneratedArticle } from '@autodialer/domain';
import { GeminiClient } from '@autodialer/clients';
import { slugify } from '@autodialer/domain';

export interface ContentGenerator {
  isConfigured(): boolean;
  activeModel(): string | undefined;
  generateArticle(request: ArticleRequest): Promise<GeneratedArticle>;
}

export interface GeminiGeneratorConfig {
  apiKey?: string;
  models: string[];
  baseUrl?: string;
}

export function buildArticlePrompt({ title, description }: ArticleRequest): string {
  const lines = [`Write a comprehensive technical blog post about: ${title}`, ''];
  if (description) {
    lines.push(`Context: ${description}`, '');
  }
  lines.push(
    'Requirements:',
    '- Professional, informative tone',
    '- Include code examples where relevant',
    '- Use ## for section headings',
    '- Length: 1000-1500 words',
    '- Practical examples and tips',
    '- Brief conclusion',
    '',
    'Write the complete article:'
  );
  return lines.join('\n');
}

export class GeminiContentGenerator implements ContentGenerator {
  private readonly gemini: GeminiClient;

  constructor(config: GeminiGeneratorConfig) {
    this.gemini = new GeminiClient(config.apiKey, { models: config.models, baseUrl: config.baseUrl });
  }

  isConfigured(): boolean {
    return this.gemini.isConfigured();
  }

  activeModel(): string | undefined {
    return this.gemini.activeModel();
  }

  /** The slug is derived from the title only; collisions are resolved on save. */
  async generateArticle(request: ArticleRequest): Promise<GeneratedArticle> {
    const result = await this.gemini.generate(buildArticlePrompt(request));
    return { body: result.text, slug: slugify(request.title), model: result.model };
  }
}
