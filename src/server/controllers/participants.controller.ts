import { Router } from 'express';
import { asyncHandler } from '../utils/async-handler.js';
import { requireAdmin } from '../middleware/auth.js';
import { ensureValid } from '../../shared/validation.js';
import { ParticipantIdSchema } from '../../shared/schema/entities.schema.js';
import {
  GenerateParticipantsRequestSchema,
  UpdateBalanceRequestSchema,
} from '../../shared/schema/dto.schema.js';
import type { ApiSuccessEnvelope, ParticipantSummary } from '../../shared/types/dto.js';
import type { Participant } from '../../shared/types/entities.js';
import type { ParticipantsService } from '../services/participants.service.js';

export interface ParticipantsControllerDependencies {
  readonly participantsService: Pick<
    ParticipantsService,
    'generate' | 'getSummary' | 'list' | 'setBalance'
  >;
}

export const registerParticipantRoutes = (
  router: Router,
  dependencies: ParticipantsControllerDependencies,
): void => {
  const { participantsService } = dependencies;

  router.get(
    '/api/participants/:participantId',
    asyncHandler(async (req, res) => {
      const participantId = ensureValid(
        ParticipantIdSchema,
        req.params.participantId,
        'Invalid participant id.',
      );
      const summary = await participantsService.getSummary(participantId);
      res.json({ data: summary } satisfies ApiSuccessEnvelope<ParticipantSummary>);
    }),
  );

  router.get(
    '/api/admin/participants',
    requireAdmin,
    asyncHandler(async (_req, res) => {
      const participants = await participantsService.list();
      res.json({ data: participants } satisfies ApiSuccessEnvelope<Participant[]>);
    }),
  );

  router.post(
    '/api/admin/participants/generate',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const payload = ensureValid(
        GenerateParticipantsRequestSchema,
        req.body ?? {},
        'Invalid generate payload.',
      );
      const participants = await participantsService.generate(payload);
      res.status(201).json({ data: participants } satisfies ApiSuccessEnvelope<Participant[]>);
    }),
  );

  router.post(
    '/api/admin/participants/:participantId/balance',
    requireAdmin,
    asyncHandler(async (req, res) => {
      const participantId = ensureValid(
        ParticipantIdSchema,
        req.params.participantId,
        'Invalid participant id.',
      );
      const payload = ensureValid(
        UpdateBalanceRequestSchema,
        req.body ?? {},
        'Invalid balance payload.',
      );
      const participant = await participantsService.setBalance(participantId, payload.balance);
      res.json({ data: participant } satisfies ApiSuccessEnvelope<Participant>);
    }),
  );
};
