import request from 'supertest';
import { createApp } from '../../app';
import { ScenarioEngine } from '../../services/metrics';
import { ManualClock } from '../../utils/clock';
import { createLogger } from '../../utils/logger';

const EPOCH = Date.UTC(2025, 0, 1);

function setup(initialScenario = 'healthy') {
  const clock = new ManualClock(EPOCH);
  const logger = createLogger({ level: 'silent', pretty: false });
  const engine = new ScenarioEngine({ initialScenario, clock, logger });
  const app = createApp({ config: { corsOrigin: '*' }, logger, engine, clock });
  return { app, engine, clock };
}

describe('Scenario API', () => {
  describe('GET /prometheus/api/scenario', () => {
    it('should return the active scenario status', async () => {
      const { app, clock } = setup();
      clock.advance(65_000);

      const response = await request(app).get('/prometheus/api/scenario');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'success',
        data: {
          name: 'healthy',
          description: 'Healthy application with minimal errors and low latency',
          startTime: '2025-01-01T00:00:00.000Z',
          elapsed: '1m 5s',
          metrics: { errorRate: 0.1, latency: 100, up: 1 },
        },
      });
    });
  });

  describe('POST /prometheus/api/scenario', () => {
    it('should switch scenario and restart the timer', async () => {
      const { app, clock } = setup();
      clock.advance(30_000);

      const response = await request(app).post('/prometheus/api/scenario').send({ scenario: 'latency-spike' });

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('success');
      expect(response.body.data).toMatchObject({
        name: 'latency-spike',
        startTime: '2025-01-01T00:00:30.000Z',
        elapsed: '0s',
        metrics: { errorRate: 0.5, latency: 150, up: 1 },
      });
    });

    it('should reject unknown scenario names and leave state untouched', async () => {
      const { app, engine } = setup('high-errors');

      const response = await request(app).post('/prometheus/api/scenario').send({ scenario: 'meltdown' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'error',
        error: 'invalid scenario type',
        valid_scenarios: ['healthy', 'high-errors', 'latency-spike', 'gradual-degradation'],
      });
      expect(engine.getStatus().name).toBe('high-errors');
    });

    it.each([{}, { scenario: '' }, { scenario: 42 }])(
      'should reject a missing or non-string scenario field (%p)',
      async (body) => {
        const { app, engine } = setup('latency-spike');

        const response = await request(app).post('/prometheus/api/scenario').send(body);

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
          status: 'error',
          error: 'invalid request: scenario is required',
        });
        expect(engine.getStatus().name).toBe('latency-spike');
      }
    );

    it('should reject malformed JSON', async () => {
      const { app } = setup();

      const response = await request(app)
        .post('/prometheus/api/scenario')
        .set('Content-Type', 'application/json')
        .send('{"scenario":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Malformed request body' });
    });
  });

  describe('POST /prometheus/api/scenario/reset', () => {
    it('should restart progression of the active scenario', async () => {
      const { app, clock } = setup('latency-spike');
      clock.advance(90_000);

      const response = await request(app).post('/prometheus/api/scenario/reset');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('timer reset');
      expect(response.body.data).toMatchObject({
        name: 'latency-spike',
        startTime: '2025-01-01T00:01:30.000Z',
        metrics: { latency: 150 },
      });
    });
  });

  describe('GET /prometheus/api/scenarios', () => {
    it('should list the catalog', async () => {
      const { app } = setup();

      const response = await request(app).get('/prometheus/api/scenarios');

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual([
        { name: 'healthy', description: 'Healthy application with minimal errors and low latency' },
        { name: 'high-errors', description: 'High error rate that progressively increases' },
        { name: 'latency-spike', description: 'Latency spike with gradual increase' },
        { name: 'gradual-degradation', description: 'Both errors and latency degrade over time' },
      ]);
    });
  });
});
