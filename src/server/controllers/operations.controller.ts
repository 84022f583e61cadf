import { Router } from 'express';
import { asyncHandler } from '../utils/async-handler.js';
import { requireAdmin } from '../middleware/auth.js';
import { ensureValid } from '../../shared/validation.js';
import { DrawRequestSchema, ResetRequestSchema } from '../../shared/schema/dto.schema.js';
import type { ApiSuccessEnvelope, DrawResponse, ResetResponse } from '../../shared/types/dto.js';
import type { RaffleLifecycleService } from '../services/raffle-lifecycle.service.js';
import { toResultView } from '../services/raffle-query.service.js';
import { logger } from '../logging.js';

export interface OperationsControllerDependencies {
  readonly lifecycleService: Pick<RaffleLifecycleService, 'triggerDraw' | 'reset'>;
}

export const registerOperationsRoutes = (
  router: Router,
  dependencies: OperationsControllerDependencies,
): void => {
  const { lifecycleService } = dependencies;

  router.post(
    '/api/admin/raffle/draw',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const payload = ensureValid(DrawRequestSchema, req.body ?? {}, 'Invalid draw payload.');
      const outcome = await lifecycleService.triggerDraw({
        trigger: 'manual',
        raffleId: payload.raffleId,
      });

      const response: DrawResponse = {
        result: toResultView(outcome.history),
        nextRaffleId: outcome.next.id,
        nextDrawAt: outcome.next.drawAt,
      };
      res.json({ data: response } satisfies ApiSuccessEnvelope<DrawResponse>);
    }),
  );

  router.post(
    '/api/admin/reset',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const payload = ensureValid(ResetRequestSchema, req.body ?? {}, 'Invalid reset payload.');
      const outcome = await lifecycleService.reset({
        keepParticipants: payload.keepParticipants ?? false,
      });

      logger.info('admin reset requested', {
        correlationId: req.correlationId,
        keepParticipants: payload.keepParticipants ?? false,
      });

      const response: ResetResponse = {
        raffleId: outcome.raffle.id,
        drawAt: outcome.raffle.drawAt,
        participantsCleared: outcome.participantsCleared,
      };
      res.json({ data: response } satisfies ApiSuccessEnvelope<ResetResponse>);
    }),
  );
};
