import { randomInt, randomUUID } from 'node:crypto';
import type { ParticipantId, RaffleId } from '../../shared/types/entities.js';
import {
  PARTICIPANT_ID_ALPHABET,
  PARTICIPANT_ID_LENGTH,
  PARTICIPANT_ID_PREFIX,
} from '../config/constants.js';

export const createRaffleId = (): RaffleId => randomUUID() as RaffleId;

export const createParticipantId = (): ParticipantId => {
  let suffix = '';
  for (let index = 0; index < PARTICIPANT_ID_LENGTH; index += 1) {
    suffix += PARTICIPANT_ID_ALPHABET.charAt(randomInt(PARTICIPANT_ID_ALPHABET.length));
  }
  return `${PARTICIPANT_ID_PREFIX}${suffix}` as ParticipantId;
};
