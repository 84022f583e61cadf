import { z } from 'zod';
import type {
  DrawTrigger,
  ISODateString,
  LedgerRow,
  Participant,
  ParticipantId,
  Points,
  Raffle,
  RaffleHistoryEntry,
  RaffleId,
  RaffleStatus,
  WinnerRecord,
} from '../types/entities.js';

export const PARTICIPANT_ID_PATTERN = /^TKN-[A-Z0-9]{6}$/;

export const ISODateStringSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value): ISODateString => value);

export const PointsSchema = z.number().int().min(0).transform((value): Points => value);

export const ParticipantIdSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(PARTICIPANT_ID_PATTERN, 'Participant ids look like TKN-A1B2C3.')
  .transform((value) => value as ParticipantId);

export const RaffleIdSchema = z
  .string()
  .min(1)
  .transform((value) => value as RaffleId);

export const RaffleStatusSchema = z
  .enum(['open', 'drawing', 'closed'])
  .transform((value): RaffleStatus => value);

export const DrawTriggerSchema = z
  .enum(['scheduled', 'manual'])
  .transform((value): DrawTrigger => value);

export const ParticipantSchema: z.ZodType<Participant, z.ZodTypeDef, unknown> = z
  .object({
    schemaVersion: z.literal(1),
    id: ParticipantIdSchema,
    balance: PointsSchema,
    totalWinnings: PointsSchema,
    totalWins: z.number().int().min(0),
    createdAt: ISODateStringSchema,
    updatedAt: ISODateStringSchema,
  })
  .strict();

export const LedgerRowSchema: z.ZodType<LedgerRow, z.ZodTypeDef, unknown> = z
  .object({
    participantId: ParticipantIdSchema,
    weight: z.number().int().min(0),
  })
  .strict();

export const RaffleSchema: z.ZodType<Raffle, z.ZodTypeDef, unknown> = z
  .object({
    schemaVersion: z.literal(1),
    id: RaffleIdSchema,
    status: RaffleStatusSchema,
    pot: PointsSchema,
    totalEntries: z.number().int().min(0),
    drawAt: ISODateStringSchema,
    createdAt: ISODateStringSchema,
    closedAt: ISODateStringSchema.nullable(),
  })
  .strict();

export const WinnerRecordSchema: z.ZodType<WinnerRecord, z.ZodTypeDef, unknown> = z
  .object({
    raffleId: RaffleIdSchema,
    position: z.number().int().min(1),
    participantId: ParticipantIdSchema,
    amount: PointsSchema,
  })
  .strict();

export const RaffleHistoryEntrySchema: z.ZodType<RaffleHistoryEntry, z.ZodTypeDef, unknown> = z
  .object({
    schemaVersion: z.literal(1),
    raffleId: RaffleIdSchema,
    trigger: DrawTriggerSchema,
    drawAt: ISODateStringSchema,
    drawnAt: ISODateStringSchema,
    totalPot: PointsSchema,
    houseCut: PointsSchema,
    distributable: PointsSchema,
    unclaimed: PointsSchema,
    totalEntries: z.number().int().min(0),
    participantCount: z.number().int().min(0),
    seed: z.string(),
    participants: z.array(LedgerRowSchema).readonly(),
    winners: z.array(WinnerRecordSchema).readonly(),
  })
  .strict();
