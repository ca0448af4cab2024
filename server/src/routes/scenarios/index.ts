import { Router } from 'express';
import { ScenarioEngine } from '../../services/metrics';
import {
  createGetScenarioHandler,
  createListScenariosHandler,
  createResetTimerHandler,
  createSetScenarioHandler,
} from './handlers';

export function createScenarioRouter(engine: ScenarioEngine): Router {
  const router = Router();

  // GET /prometheus/api/scenario - Active scenario, elapsed time and live values
  router.get('/scenario', createGetScenarioHandler(engine));

  // POST /prometheus/api/scenario - Switch scenario and restart its timer
  router.post('/scenario', createSetScenarioHandler(engine));

  // POST /prometheus/api/scenario/reset - Restart the timer of the active scenario
  router.post('/scenario/reset', createResetTimerHandler(engine));

  // GET /prometheus/api/scenarios - Catalog listing
  router.get('/scenarios', createListScenariosHandler(engine));

  return router;
}
