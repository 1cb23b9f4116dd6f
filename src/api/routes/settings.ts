import type { FastifyPluginAsync } from 'fastify';
import { maskSettings } from '../../settings/index.js';
import { SettingsValidationError } from '../../validation/index.js';

const settingsRoutes: FastifyPluginAsync = async (fastify) => {
  const { validator, appLogger: logger } = fastify;

  fastify.get('/', async () => {
    return maskSettings(await validator.getSettings());
  });

  fastify.put('/', async (request, reply) => {
    try {
      const settings = await validator.updateSettings(request.body);
      return {
        success: true,
        message: 'Validation settings updated successfully',
        settings: maskSettings(settings),
      };
    } catch (err) {
      if (err instanceof SettingsValidationError) {
        return reply.code(400).send({ success: false, error: err.message, issues: err.issues });
      }
      logger.error({ err }, 'Error saving validation settings');
      return reply.code(500).send({ success: false, error: 'Error saving settings' });
    }
  });

  fastify.post('/test-connection', async () => {
    return validator.testConnection();
  });
};

export default settingsRoutes;
