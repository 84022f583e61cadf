export type Brand<T, B extends string> = T & { readonly __brand: B };

export type ParticipantId = Brand<string, 'ParticipantId'>;
export type RaffleId = Brand<string, 'RaffleId'>;

export type ISODateString = string;
export type Points = number; // Stored as integer >= 0

export type RaffleStatus = 'open' | 'drawing' | 'closed';
export type DrawTrigger = 'scheduled' | 'manual';

export interface Participant {
  readonly schemaVersion: 1;
  readonly id: ParticipantId;
  readonly balance: Points;
  readonly totalWinnings: Points;
  readonly totalWins: number;
  readonly createdAt: ISODateString;
  readonly updatedAt: ISODateString;
}

export interface LedgerRow {
  readonly participantId: ParticipantId;
  readonly weight: number;
}

export interface Raffle {
  readonly schemaVersion: 1;
  readonly id: RaffleId;
  readonly status: RaffleStatus;
  readonly pot: Points;
  readonly totalEntries: number;
  readonly drawAt: ISODateString;
  readonly createdAt: ISODateString;
  readonly closedAt: ISODateString | null;
}

export interface WinnerRecord {
  readonly raffleId: RaffleId;
  readonly position: number;
  readonly participantId: ParticipantId;
  readonly amount: Points;
}

export interface RaffleHistoryEntry {
  readonly schemaVersion: 1;
  readonly raffleId: RaffleId;
  readonly trigger: DrawTrigger;
  readonly drawAt: ISODateString;
  readonly drawnAt: ISODateString;
  readonly totalPot: Points;
  readonly houseCut: Points;
  readonly distributable: Points;
  readonly unclaimed: Points;
  readonly totalEntries: number;
  readonly participantCount: number;
  readonly seed: string;
  readonly participants: readonly LedgerRow[];
  readonly winners: readonly WinnerRecord[];
}
