import type { AppConfig } from '../../shared/types/config.js';

export const DEFAULT_APP_CONFIG: AppConfig = {
  entryCost: 10,
  maxEntriesPerRegistration: 100,
  startingBalance: 100,
  drawIntervalMinutes: 60,
  winnerCount: 5,
  positionShares: [0.4, 0.25, 0.18, 0.1, 0.07],
  houseEdge: 0.1,
  redistributeUnclaimedShares: false,
};
