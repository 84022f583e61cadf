import { z } from 'zod';

export const BASIS_POINTS = 10_000;

export const toBasisPoints = (fraction: number): number => Math.round(fraction * BASIS_POINTS);

const ConfigShape = z
  .object({
    entryCost: z.number().int().min(0),
    maxEntriesPerRegistration: z.number().int().min(1).max(10_000),
    startingBalance: z.number().int().min(0),
    drawIntervalMinutes: z.number().int().min(1).max(10_080),
    winnerCount: z.number().int().min(1).max(100),
    positionShares: z.array(z.number().gt(0).max(1)).min(1).max(100).readonly(),
    houseEdge: z.number().min(0).lt(1),
    redistributeUnclaimedShares: z.boolean(),
  })
  .strict();

export const AppConfigSchema = ConfigShape.superRefine((config, ctx) => {
  const totalBps = config.positionShares.reduce((sum, share) => sum + toBasisPoints(share), 0);
  if (totalBps !== BASIS_POINTS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['positionShares'],
      message: `Position shares must sum to 1.0 (got ${totalBps / BASIS_POINTS}).`,
    });
  }

  if (config.winnerCount !== config.positionShares.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['winnerCount'],
      message: 'winnerCount must match the number of position shares.',
    });
  }
});

export const AppConfigPatchSchema = ConfigShape.partial().strict();
