import type { ArticleRequest, BlogPostRecord } from '@autodialer/domain';
import {
  AppError,
  FeatureUnavailableError,
  InvalidInputError,
  NotFoundError,
  errorMessage,
  uniqueSlug
} from '@autodialer/domain';
import { randomUUID } from 'node:crypto';
import type { ContentGenerator } from '../adapters/content-generator.js';
import { childLogger, type Logger } from './logger.js';
import type { JsonRecordStore, Mutation } from './record-store.js';

export interface ArticleInput {
  title: string;
  description?: string;
}

export interface ArticleOutcome {
  title: string;
  ok: boolean;
  id?: string;
  slug?: string;
  error?: string;
  message?: string;
}

/**
 * Reads one article per line as `title | description`. Blank lines and lines
 * starting with `#` are skipped.
 */
export function parseArticleList(prompt: string): ArticleInput[] {
  const articles: ArticleInput[] = [];
  for (const rawLine of prompt.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('|');
    const title = (separator === -1 ? line : line.slice(0, separator)).trim();
    const description = separator === -1 ? '' : line.slice(separator + 1).trim();
    if (title) {
      articles.push({ title, description });
    }
  }
  return articles;
}

export class BlogService {
  private readonly log: Logger;

  constructor(
    private readonly store: JsonRecordStore,
    private readonly generator: ContentGenerator,
    logger: Logger
  ) {
    this.log = childLogger(logger, 'blog-service');
  }

  async generate(input: ArticleInput): Promise<BlogPostRecord> {
    const request = this.toRequest(input);
    this.assertGeneratorConfigured();

    const article = await this.generator.generateArticle(request);
    const post = await this.store.update('blog_posts', (records) => {
      const record: BlogPostRecord = {
        id: randomUUID(),
        title: request.title,
        slug: uniqueSlug(article.slug, records.map((existing) => existing.slug)),
        description: request.description ? request.description.slice(0, 500) : request.title.slice(0, 200),
        body: article.body,
        model: article.model,
        createdAt: new Date().toISOString(),
        viewCount: 0
      };
      records.push(record);
      return { records, result: record };
    });

    this.log.info({ postId: post.id, slug: post.slug, model: post.model, chars: post.body.length }, 'article_generated');
    return post;
  }

  async generateBulk(inputs: ArticleInput[]): Promise<ArticleOutcome[]> {
    this.assertGeneratorConfigured();

    const outcomes: ArticleOutcome[] = [];
    for (const [index, input] of inputs.entries()) {
      this.log.info({ position: index + 1, total: inputs.length, title: input.title }, 'bulk_article_started');
      try {
        const post = await this.generate(input);
        outcomes.push({ title: post.title, ok: true, id: post.id, slug: post.slug });
      } catch (error) {
        if (error instanceof AppError) {
          outcomes.push({ title: input.title, ok: false, error: error.code, message: error.message });
          continue;
        }
        this.log.error({ err: error, title: input.title }, 'bulk_article_crashed');
        outcomes.push({ title: input.title, ok: false, error: 'internal_error', message: errorMessage(error) });
      }
    }
    return outcomes;
  }

  async list(): Promise<BlogPostRecord[]> {
    const posts = await this.store.list('blog_posts');
    return [...posts].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /** Returns the post with its view counted. */
  async view(slug: string): Promise<BlogPostRecord> {
    const post = await this.store.update('blog_posts', (records): Mutation<BlogPostRecord, BlogPostRecord | null> => {
      const record = records.find((candidate) => candidate.slug === slug);
      if (!record) {
        return { records, result: null, changed: false };
      }
      record.viewCount += 1;
      return { records, result: { ...record } };
    });

    if (!post) {
      throw new NotFoundError('post', slug);
    }
    return post;
  }

  async delete(id: string): Promise<void> {
    const removed = await this.store.delete('blog_posts', id);
    if (!removed) {
      throw new NotFoundError('post', id);
    }
    this.log.info({ postId: id }, 'article_deleted');
  }

  private toRequest(input: ArticleInput): ArticleRequest {
    const title = input.title.trim();
    if (!title) {
      throw new InvalidInputError('title is required');
    }
    return { title, description: (input.description ?? '').trim() };
  }

  private assertGeneratorConfigured(): void {
    if (!this.generator.isConfigured()) {
      throw new FeatureUnavailableError('generation', 'Gemini API key is not configured');
    }
  }
}
