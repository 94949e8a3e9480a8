import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { DEFAULT_NAMESPACE, parseWriteMode } from '../../memory/index.js';
import { isWriteRejected } from '../../models/memory.js';

export const MemoryGetArgsSchema = z
  .object({
    namespace: z.string().default(DEFAULT_NAMESPACE),
    limit: z.number().int().nullish(),
  })
  .default({});

export const MemoryWriteArgsSchema = z
  .object({
    namespace: z.string().default(DEFAULT_NAMESPACE),
    data: z.record(z.unknown()).nullish(),
    mode: z.string().default('append'),
  })
  .default({});

export const TOOLS = [
  {
    name: 'memory_get',
    description: 'Get persisted training context memory entries',
    arguments: {
      namespace: 'Logical namespace for separating memories',
      limit: 'Optional limit for most recent entries',
    },
  },
  {
    name: 'memory_write',
    description: 'Persist training context memory entries',
    arguments: {
      namespace: 'Logical namespace for separating memories',
      data: 'Entry payload to append or replace with',
      mode: 'append | replace | clear',
    },
  },
];

const toolsRoute: FastifyPluginAsync = async (fastify) => {
  const { memory, proxyLogger: logger } = fastify;

  fastify.get('/tools', async () => {
    return { tools: TOOLS };
  });

  fastify.post('/tools/memory_get', async (request, reply) => {
    const args = MemoryGetArgsSchema.safeParse(request.body ?? undefined);
    if (!args.success) {
      return reply.code(400).send({ error: 'Invalid arguments', issues: args.error.issues });
    }

    const { namespace, limit } = args.data;
    return memory.get(namespace, limit ?? undefined);
  });

  fastify.post('/tools/memory_write', async (request, reply) => {
    const args = MemoryWriteArgsSchema.safeParse(request.body ?? undefined);
    if (!args.success) {
      return reply.code(400).send({ error: 'Invalid arguments', issues: args.error.issues });
    }

    const { namespace, data, mode } = args.data;
    const result = await memory.write(namespace, data ?? undefined, parseWriteMode(mode));

    if (isWriteRejected(result)) {
      logger.info({ subject: request.auth?.sub }, 'Memory write refused');
      return reply.code(403).send({ error: result.reason, message: result.message });
    }

    return result;
  });
};

export default toolsRoute;
