import { REDIS_NAMESPACE } from '../config/constants.js';

const concat = (...parts: (string | number | undefined)[]): string =>
  parts.filter((part) => part !== undefined).join(':');

const base = (entity: string, ...rest: (string | number)[]) =>
  concat(REDIS_NAMESPACE, entity, ...rest);

export const participantKeys = {
  index: () => base('participants'),
  record: (participantId: string) => base('participant', participantId),
};

export const raffleKeys = {
  current: () => base('current'),
  index: () => base('raffles'),
  record: (raffleId: string) => base('raffle', raffleId),
  ledger: (raffleId: string) => base('raffle', raffleId, 'ledger'),
  ledgerOrder: (raffleId: string) => base('raffle', raffleId, 'ledger-order'),
};

export const historyKeys = {
  list: () => base('history'),
};

export const configKeys = {
  override: () => base('config', 'override'),
};
