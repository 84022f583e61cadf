import type { ParticipantSummary } from '../../shared/types/dto.js';
import type { Participant, ParticipantId, Points } from '../../shared/types/entities.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { logger } from '../logging.js';
import type { RaffleStore } from '../repositories/raffle-store.js';
import { createParticipantId } from '../utils/id.js';
import { nowIso } from '../utils/time.js';
import type { ConfigReader } from './raffle-lifecycle.service.js';

export interface EntryCounter {
  entriesFor(participantId: ParticipantId): Promise<number>;
}

export interface GenerateParticipantsOptions {
  readonly count: number;
  readonly balance?: Points;
}

const MAX_ID_ATTEMPTS = 20;

export class ParticipantsService {
  private readonly store: RaffleStore;
  private readonly config: ConfigReader;
  private readonly entries: EntryCounter;
  private readonly createId: () => ParticipantId;

  constructor(
    store: RaffleStore,
    config: ConfigReader,
    entries: EntryCounter,
    createId: () => ParticipantId = createParticipantId,
  ) {
    this.store = store;
    this.config = config;
    this.entries = entries;
    this.createId = createId;
  }

  /** Issues `count` new tokens, funded with `balance` or the configured starting balance. */
  async generate(options: GenerateParticipantsOptions): Promise<Participant[]> {
    const config = await this.config.getConfig();
    const balance = options.balance ?? config.startingBalance;
    const existing = new Set((await this.store.listParticipants()).map((item) => item.id));
    const timestamp = nowIso();

    const participants: Participant[] = [];
    for (let index = 0; index < options.count; index += 1) {
      const id = this.nextUniqueId(existing);
      existing.add(id);
      participants.push({
        schemaVersion: 1,
        id,
        balance,
        totalWinnings: 0,
        totalWins: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      });
    }

    await this.store.createParticipants(participants);
    logger.info('participants generated', { count: participants.length, balance });
    return participants;
  }

  async getSummary(participantId: ParticipantId): Promise<ParticipantSummary> {
    const participant = await this.store.getParticipant(participantId);
    if (!participant) {
      throw new NotFoundError(`Participant ${participantId} not found.`);
    }

    return {
      participantId: participant.id,
      balance: participant.balance,
      currentEntries: await this.entries.entriesFor(participant.id),
      totalWins: participant.totalWins,
      totalWinnings: participant.totalWinnings,
    };
  }

  async list(): Promise<Participant[]> {
    return this.store.listParticipants();
  }

  async setBalance(participantId: ParticipantId, balance: Points): Promise<Participant> {
    const updated = await this.store.setParticipantBalance(participantId, balance);
    logger.info('participant balance set', { participantId, balance });
    return updated;
  }

  private nextUniqueId(taken: ReadonlySet<string>): ParticipantId {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const candidate = this.createId();
      if (!taken.has(candidate)) {
        return candidate;
      }
    }
    throw new ConflictError('Unable to allocate a unique participant id.');
  }
}
