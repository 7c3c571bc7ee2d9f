import type { FastifyInstance } from 'fastify';

export async function moviesRoutes(fastify: FastifyInstance) {
  const catalog = fastify.catalog;

  // GET /v1/movies
  fastify.get('/', async () => {
    const movies = await catalog.listItems();
    return { movies };
  });

  // GET /v1/movies/:movieId
  fastify.get<{ Params: { movieId: string } }>('/:movieId', async (request) => {
    return catalog.getItem(request.params.movieId);
  });
}
