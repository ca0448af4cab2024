import { Request, Response } from 'express';
import { QueryEvaluator, toPrometheusResponse, PrometheusResponse } from '../../services/metrics';

/**
 * GET takes `query` from the URL; POST takes it from a form or JSON body.
 */
function readQuery(req: Request): string {
  const source: unknown = req.method === 'POST' ? req.body : req.query;
  if (source && typeof source === 'object' && 'query' in source && typeof source.query === 'string') {
    return source.query;
  }
  return '';
}

export function createQueryHandler(evaluator: QueryEvaluator) {
  return (req: Request, res: Response<PrometheusResponse>): void => {
    const query = readQuery(req);

    if (query.trim() === '') {
      res.status(400).json({
        status: 'error',
        errorType: 'bad_data',
        error: 'query parameter is required',
      });
      return;
    }

    res.json(toPrometheusResponse(evaluator.evaluate(query)));
  };
}
