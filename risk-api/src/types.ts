import 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    requestStart?: number;
  }
}

export {};
