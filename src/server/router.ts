import { Router } from 'express';
import {
  registerRaffleRoutes,
  type RaffleControllerDependencies,
} from './controllers/raffle.controller.js';
import {
  registerParticipantRoutes,
  type ParticipantsControllerDependencies,
} from './controllers/participants.controller.js';
import {
  registerOperationsRoutes,
  type OperationsControllerDependencies,
} from './controllers/operations.controller.js';
import {
  registerConfigRoutes,
  type ConfigControllerDependencies,
} from './controllers/config.controller.js';

export type RouterDependencies = RaffleControllerDependencies &
  ParticipantsControllerDependencies &
  OperationsControllerDependencies &
  ConfigControllerDependencies;

export const createAppRouter = (dependencies: RouterDependencies): Router => {
  const router = Router();

  router.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  registerRaffleRoutes(router, dependencies);
  registerParticipantRoutes(router, dependencies);
  registerOperationsRoutes(router, dependencies);
  registerConfigRoutes(router, dependencies);

  return router;
};
