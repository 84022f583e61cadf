import { Router } from 'express';
import { asyncHandler } from '../utils/async-handler.js';
import { ensureValid } from '../../shared/validation.js';
import { EnterRaffleRequestSchema, HistoryQuerySchema } from '../../shared/schema/dto.schema.js';
import type {
  ApiSuccessEnvelope,
  CurrentRaffleView,
  EnterRaffleResponse,
  LatestWinnersResponse,
  RaffleResultView,
} from '../../shared/types/dto.js';
import type { RaffleLifecycleService } from '../services/raffle-lifecycle.service.js';
import type { RaffleQueryService } from '../services/raffle-query.service.js';

export interface RaffleControllerDependencies {
  readonly lifecycleService: Pick<RaffleLifecycleService, 'register'>;
  readonly raffleQueryService: Pick<
    RaffleQueryService,
    'getCurrent' | 'getHistory' | 'getLatestWinners'
  >;
}

export const registerRaffleRoutes = (
  router: Router,
  dependencies: RaffleControllerDependencies,
): void => {
  const { lifecycleService, raffleQueryService } = dependencies;

  router.get(
    '/api/raffle/current',
    asyncHandler(async (_req, res) => {
      const view = await raffleQueryService.getCurrent();
      res.json({ data: view } satisfies ApiSuccessEnvelope<CurrentRaffleView>);
    }),
  );

  router.post(
    '/api/raffle/enter',
    asyncHandler(async (req, res) => {
      const payload = ensureValid(
        EnterRaffleRequestSchema,
        req.body ?? {},
        'Invalid entry payload.',
      );

      const result = await lifecycleService.register(payload.participantId, payload.entries);
      res.status(201).json({ data: result } satisfies ApiSuccessEnvelope<EnterRaffleResponse>);
    }),
  );

  router.get(
    '/api/raffle/history',
    asyncHandler(async (req, res) => {
      const query = ensureValid(HistoryQuerySchema, req.query, 'Invalid history query.');
      const history = await raffleQueryService.getHistory(query.limit);
      res.json({ data: history } satisfies ApiSuccessEnvelope<RaffleResultView[]>);
    }),
  );

  router.get(
    '/api/raffle/latest-winners',
    asyncHandler(async (_req, res) => {
      const result = await raffleQueryService.getLatestWinners();
      res.json({ data: { result } } satisfies ApiSuccessEnvelope<LatestWinnersResponse>);
    }),
  );
};
