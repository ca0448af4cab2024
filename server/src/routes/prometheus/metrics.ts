import { Request, Response } from 'express';
import { EXPOSITION_CONTENT_TYPE, MetricSource, renderExposition } from '../../services/metrics';

export function createMetricsHandler(source: MetricSource) {
  return (_req: Request, res: Response): void => {
    // res.set() and string bodies both append a charset to text/* types.
    res.setHeader('Content-Type', EXPOSITION_CONTENT_TYPE);
    res.send(Buffer.from(renderExposition(source.getCurrentMetrics())));
  };
}
