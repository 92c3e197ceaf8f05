import request from 'supertest';
import { createTestApp, type TestApp } from './helpers/app';

describe('Health Check', () => {
  let testApp: TestApp;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    testApp = createTestApp({ VERDICT_HEALTH_FAILURE_THRESHOLD: '1' });
  });

  afterEach(async () => {
    await testApp.cleanup();
    jest.restoreAllMocks();
  });

  it('should return 200 OK and status ok', async () => {
    const res = await request(testApp.app).get('/api/health');

    expect(res.statusCode).toEqual(200);
    expect(res.body).toEqual({ status: 'ok', timestamp: expect.any(String), errors: {} });
  });

  it('should report degraded once failures pass the configured threshold', async () => {
    testApp.errorHandler.handleAnalysisFailure(new Error('first'));
    testApp.errorHandler.handleAnalysisFailure(new Error('second'));

    const res = await request(testApp.app).get('/api/health');

    expect(res.statusCode).toEqual(503);
    expect(res.body).toEqual({ status: 'degraded', timestamp: expect.any(String), errors: { ANALYSIS_FAILURE: 2 } });
  });

  it('should follow threshold changes at runtime', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    testApp.errorHandler.handleAnalysisFailure(new Error('first'));
    testApp.errorHandler.handleAnalysisFailure(new Error('second'));

    testApp.configManager.updateConfig({ health: { failureThreshold: 5 } });
    const res = await request(testApp.app).get('/api/health');

    expect(res.statusCode).toEqual(200);
  });

  it('should count malformed payloads without degrading', async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    await request(testApp.app).post('/analyze').send({ fingerprint: 'not an object' });
    await request(testApp.app).post('/analyze').send({ fingerprint: 'still not an object' });
    const res = await request(testApp.app).get('/api/health');

    expect(res.statusCode).toEqual(200);
    expect(res.body.errors).toEqual({ MALFORMED_PAYLOAD: 2 });
  });

  it('should answer with a JSON failure when a route throws', async () => {
    jest.spyOn(testApp.logger, 'getAnalytics').mockImplementation(() => {
      throw new Error('analytics unavailable');
    });

    const res = await request(testApp.app).get('/api/stats');

    expect(res.statusCode).toEqual(500);
    expect(res.body).toEqual({
      success: false,
      error: 'analytics unavailable',
      correlationId: res.headers['x-correlation-id'],
    });
    expect(testApp.errorHandler.getErrorStats().errorCounts).toEqual({ ANALYSIS_FAILURE: 1 });
  });

  it('should expose the analysis statistics', async () => {
    await request(testApp.app).post('/analyze').send({});

    const res = await request(testApp.app).get('/api/stats');

    expect(res.statusCode).toEqual(200);
    expect(res.body).toMatchObject({
      totalRequests: 1,
      completedAnalyses: 1,
      failedAnalyses: 0,
      malformedPayloads: 0,
    });
  });
});
