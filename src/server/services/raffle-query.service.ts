import type {
  CurrentRaffleView,
  RaffleResultView,
} from '../../shared/types/dto.js';
import type { RaffleHistoryEntry } from '../../shared/types/entities.js';
import { DEFAULT_HISTORY_LIMIT } from '../config/constants.js';
import { NotFoundError } from '../errors.js';
import type { RaffleStore } from '../repositories/raffle-store.js';
import { nowIso } from '../utils/time.js';
import type { ConfigReader, RaffleView } from './raffle-lifecycle.service.js';

export interface CurrentRaffleSource {
  currentRaffle(): Promise<RaffleView | null>;
}

export const toResultView = (entry: RaffleHistoryEntry): RaffleResultView => ({
  raffleId: entry.raffleId,
  trigger: entry.trigger,
  drawAt: entry.drawAt,
  drawnAt: entry.drawnAt,
  totalPot: entry.totalPot,
  houseCut: entry.houseCut,
  totalEntries: entry.totalEntries,
  participantCount: entry.participantCount,
  winners: entry.winners.map((winner) => ({
    participantId: winner.participantId,
    position: winner.position,
    amount: winner.amount,
  })),
});

export class RaffleQueryService {
  private readonly store: RaffleStore;
  private readonly lifecycle: CurrentRaffleSource;
  private readonly config: ConfigReader;

  constructor(store: RaffleStore, lifecycle: CurrentRaffleSource, config: ConfigReader) {
    this.store = store;
    this.lifecycle = lifecycle;
    this.config = config;
  }

  async getCurrent(): Promise<CurrentRaffleView> {
    const view = await this.lifecycle.currentRaffle();
    if (!view) {
      throw new NotFoundError('No raffle is active.');
    }

    const config = await this.config.getConfig();
    return {
      raffleId: view.raffle.id,
      status: view.raffle.status,
      drawAt: view.raffle.drawAt,
      totalPot: view.raffle.pot,
      participantCount: view.participants.length,
      totalEntries: view.raffle.totalEntries,
      participants: view.participants,
      entryCost: config.entryCost,
      serverTime: nowIso(),
    };
  }

  /** Newest first. */
  async getHistory(limit = DEFAULT_HISTORY_LIMIT): Promise<RaffleResultView[]> {
    const entries = await this.store.listHistory(limit);
    return entries.map(toResultView);
  }

  async getLatestWinners(): Promise<RaffleResultView | null> {
    const [latest] = await this.store.listHistory(1);
    return latest ? toResultView(latest) : null;
  }
}
