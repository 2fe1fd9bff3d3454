import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseArticleList, type ArticleInput, type BlogService } from '../services/blog-service.js';
import { parseWith } from '../utils/validation.js';

export type BlogRoutesOptions = {
  blog: BlogService;
};

const articleBody = z.object({
  title: z.string(),
  description: z.string().optional()
});

const bulkBody = z
  .object({
    titles: z.array(z.union([z.string(), articleBody])).optional(),
    prompt: z.string().optional()
  })
  .refine((body) => body.titles !== undefined || body.prompt !== undefined, {
    message: 'titles or prompt is required'
  });

const slugParams = z.object({ slug: z.string().min(1) });
const idParams = z.object({ id: z.string().min(1) });

export async function blogRoutes(app: FastifyInstance, opts: BlogRoutesOptions): Promise<void> {
  const { blog } = opts;

  app.post('/api/generate_article', async (req, reply) => {
    const body = parseWith(articleBody, req.body);
    const post = await blog.generate(body);
    return reply.send({ ok: true, id: post.id, slug: post.slug, title: post.title, model: post.model });
  });

  app.post('/api/generate_articles_bulk', async (req, reply) => {
    const body = parseWith(bulkBody, req.body);
    const inputs: ArticleInput[] = body.titles
      ? body.titles.map((item) => (typeof item === 'string' ? { title: item } : item))
      : parseArticleList(body.prompt ?? '');

    if (inputs.length === 0) {
      return reply.status(400).send({ error: 'invalid_input', message: 'no articles found in request' });
    }

    const results = await blog.generateBulk(inputs);
    return reply.send({
      ok: true,
      generated: results.filter((result) => result.ok).length,
      total: results.length,
      results
    });
  });

  app.get('/api/blog', async () => {
    return { posts: await blog.list() };
  });

  app.get('/blog/:slug', async (req, reply) => {
    const { slug } = parseWith(slugParams, req.params);
    const post = await blog.view(slug);
    return reply.send({ post });
  });

  app.delete('/api/blog/:id', async (req, reply) => {
    const { id } = parseWith(idParams, req.params);
    await blog.delete(id);
    return reply.send({ ok: true, id });
  });
}
