export const REDIS_NAMESPACE = 'raffle';
export const MAX_TRANSACTION_RETRIES = 3;
export const DEFAULT_DRAW_TICK_CRON = '*/10 * * * * *';
export const DEFAULT_HISTORY_LIMIT = 5;
export const PARTICIPANT_ID_PREFIX = 'TKN-';
export const PARTICIPANT_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const PARTICIPANT_ID_LENGTH = 6;
