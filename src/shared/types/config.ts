export interface AppConfig {
  readonly entryCost: number;
  readonly maxEntriesPerRegistration: number;
  readonly startingBalance: number;
  readonly drawIntervalMinutes: number;
  readonly winnerCount: number;
  readonly positionShares: readonly number[];
  readonly houseEdge: number;
  readonly redistributeUnclaimedShares: boolean;
}

export interface ConfigSnapshot {
  readonly config: AppConfig;
  readonly source: 'defaults' | 'override';
  readonly fetchedAt: string;
}
