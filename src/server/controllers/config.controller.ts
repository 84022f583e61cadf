import { Router } from 'express';
import type { ConfigService } from '../services/config.service.js';
import { asyncHandler } from '../utils/async-handler.js';
import { requireAdmin } from '../middleware/auth.js';
import type { ApiSuccessEnvelope, ConfigResponse } from '../../shared/types/dto.js';
import type { AppConfig } from '../../shared/types/config.js';
import { InvalidConfigurationError } from '../errors.js';

export interface ConfigControllerDependencies {
  readonly configService: Pick<ConfigService, 'getSnapshot' | 'updateConfig' | 'clearOverride'>;
}

const buildResponse = (config: AppConfig, source: ConfigResponse['source']) =>
  ({ data: { config, source } }) satisfies ApiSuccessEnvelope<ConfigResponse>;

export const registerConfigRoutes = (
  router: Router,
  dependencies: ConfigControllerDependencies,
): void => {
  const { configService } = dependencies;

  router.get(
    '/api/admin/config',
    requireAdmin,
    asyncHandler(async (_req, res) => {
      const snapshot = await configService.getSnapshot();
      res.json(buildResponse(snapshot.config, snapshot.source));
    }),
  );

  router.put(
    '/api/admin/config',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new InvalidConfigurationError('Configuration patch must be a JSON object.');
      }

      const config = await configService.updateConfig(body);
      res.json(buildResponse(config, 'override'));
    }),
  );

  router.delete(
    '/api/admin/config',
    requireAdmin,
    asyncHandler(async (_req, res) => {
      const config = await configService.clearOverride();
      res.json(buildResponse(config, 'defaults'));
    }),
  );
};
