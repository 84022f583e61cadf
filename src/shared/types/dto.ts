import type { AppConfig } from './config.js';
import type {
  DrawTrigger,
  ISODateString,
  LedgerRow,
  ParticipantId,
  Points,
  RaffleId,
  RaffleStatus,
} from './entities.js';

export interface ApiSuccessEnvelope<T> {
  readonly data: T;
}

export interface ApiErrorEnvelope {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export interface EnterRaffleRequest {
  readonly participantId: ParticipantId;
  readonly entries: number;
}

export interface EnterRaffleResponse {
  readonly raffleId: RaffleId;
  readonly participantId: ParticipantId;
  readonly cost: Points;
  readonly balance: Points;
  readonly participantEntries: number;
  readonly pot: Points;
}

export interface ParticipantSummary {
  readonly participantId: ParticipantId;
  readonly balance: Points;
  readonly currentEntries: number;
  readonly totalWins: number;
  readonly totalWinnings: Points;
}

export interface CurrentRaffleView {
  readonly raffleId: RaffleId;
  readonly status: RaffleStatus;
  readonly drawAt: ISODateString;
  readonly totalPot: Points;
  readonly participantCount: number;
  readonly totalEntries: number;
  readonly participants: readonly LedgerRow[];
  readonly entryCost: Points;
  readonly serverTime: ISODateString;
}

export interface WinnerView {
  readonly participantId: ParticipantId;
  readonly position: number;
  readonly amount: Points;
}

export interface RaffleResultView {
  readonly raffleId: RaffleId;
  readonly trigger: DrawTrigger;
  readonly drawAt: ISODateString;
  readonly drawnAt: ISODateString;
  readonly totalPot: Points;
  readonly houseCut: Points;
  readonly totalEntries: number;
  readonly participantCount: number;
  readonly winners: readonly WinnerView[];
}

export interface LatestWinnersResponse {
  readonly result: RaffleResultView | null;
}

export interface DrawRequest {
  readonly raffleId?: RaffleId;
}

export interface DrawResponse {
  readonly result: RaffleResultView;
  readonly nextRaffleId: RaffleId;
  readonly nextDrawAt: ISODateString;
}

export interface ResetRequest {
  readonly keepParticipants?: boolean;
}

export interface ResetResponse {
  readonly raffleId: RaffleId;
  readonly drawAt: ISODateString;
  readonly participantsCleared: boolean;
}

export interface GenerateParticipantsRequest {
  readonly count: number;
  readonly balance?: number;
}

export interface UpdateBalanceRequest {
  readonly balance: number;
}

export interface ConfigResponse {
  readonly config: AppConfig;
  readonly source: 'defaults' | 'override';
}
