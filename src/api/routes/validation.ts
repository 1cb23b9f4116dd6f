import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

// Constants for input validation
export const MAX_BATCH_SIZE = 100;
export const MAX_NAME_LENGTH = 260;
export const MAX_TYPE_LENGTH = 200;

const ValidateNameBody = z.object({
  resourceName: z.string().trim().min(1).max(MAX_NAME_LENGTH),
  resourceType: z.string().trim().min(1).max(MAX_TYPE_LENGTH),
});

const ValidateBatchBody = z.object({
  requests: z.array(ValidateNameBody).min(1).max(MAX_BATCH_SIZE),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

const validationRoutes: FastifyPluginAsync = async (fastify) => {
  const { validator } = fastify;

  fastify.post('/validate', async (request, reply) => {
    const body = ValidateNameBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: formatIssues(body.error) });
    }
    return validator.validateName(body.data.resourceName, body.data.resourceType);
  });

  fastify.post('/validate/batch', async (request, reply) => {
    const body = ValidateBatchBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: formatIssues(body.error) });
    }
    const results = await validator.validateBatch(body.data.requests);
    return Object.fromEntries(results);
  });

  fastify.post('/names/resolve', async (request, reply) => {
    const body = ValidateNameBody.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: formatIssues(body.error) });
    }
    return validator.resolveName(body.data.resourceName, body.data.resourceType);
  });
};

export default validationRoutes;
