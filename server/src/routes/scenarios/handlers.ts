import { Request, Response } from 'express';
import { ScenarioEngine, isScenarioName, validScenarioNames } from '../../services/metrics';

export function createGetScenarioHandler(engine: ScenarioEngine) {
  return (_req: Request, res: Response): void => {
    res.json({ status: 'success', data: engine.getStatus() });
  };
}

export function createListScenariosHandler(engine: ScenarioEngine) {
  return (_req: Request, res: Response): void => {
    res.json({ status: 'success', data: engine.listScenarios() });
  };
}

/**
 * Strict counterpart to `ScenarioEngine.setScenario`, which would silently
 * fall back to healthy: unknown names are rejected here.
 */
export function createSetScenarioHandler(engine: ScenarioEngine) {
  return (req: Request, res: Response): void => {
    const body: unknown = req.body;
    const requested =
      body && typeof body === 'object' && 'scenario' in body ? body.scenario : undefined;

    if (typeof requested !== 'string' || requested === '') {
      res.status(400).json({ status: 'error', error: 'invalid request: scenario is required' });
      return;
    }

    if (!isScenarioName(requested)) {
      res.status(400).json({
        status: 'error',
        error: 'invalid scenario type',
        valid_scenarios: validScenarioNames(),
      });
      return;
    }

    engine.setScenario(requested);
    res.json({ status: 'success', data: engine.getStatus() });
  };
}

export function createResetTimerHandler(engine: ScenarioEngine) {
  return (_req: Request, res: Response): void => {
    engine.resetTimer();
    res.json({ status: 'success', message: 'timer reset', data: engine.getStatus() });
  };
}
