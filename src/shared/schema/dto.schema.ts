import { z } from 'zod';
import { ParticipantIdSchema, RaffleIdSchema } from './entities.schema.js';

export const EnterRaffleRequestSchema = z
  .object({
    participantId: ParticipantIdSchema,
    entries: z.number().int().min(1).default(1),
  })
  .strict();

export const DrawRequestSchema = z
  .object({
    raffleId: RaffleIdSchema.optional(),
  })
  .strict();

export const ResetRequestSchema = z
  .object({
    keepParticipants: z.boolean().optional(),
  })
  .strict();

export const GenerateParticipantsRequestSchema = z
  .object({
    count: z.number().int().min(1).max(500),
    balance: z.number().int().min(0).optional(),
  })
  .strict();

export const UpdateBalanceRequestSchema = z
  .object({
    balance: z.number().int().min(0),
  })
  .strict();

export const HistoryQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(50).default(5),
  })
  .strict();
