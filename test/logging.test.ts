import fs from 'fs';
import os from 'os';
import path from 'path';
import { AnalysisLogger, type AnalysisLogEntry, type LoggedRequest } from '../src/utils/logger/analysisLogger';
import { installConsoleTee } from '../src/utils/logger/fileLogger';
import { rotateFile } from '../src/utils/rotateFile';
import { VisitorAnalysisPipeline } from '../src/detection/VisitorAnalysisPipeline';
import { parseFingerprint } from '../src/detection/types/Fingerprint';
import type { VisitorReport } from '../src/detection/types/index';
import { FIXED_NOW, HUMAN_FINGERPRINT, makeTransport } from './helpers/fixtures';

function readEntries(file: string): AnalysisLogEntry[] {
  return fs
    .readFileSync(file, 'utf8')
    .split('\n')
    .filter(line => line.length > 0)
    .map(line => JSON.parse(line));
}

function reportFor(fingerprint: Record<string, unknown>): VisitorReport {
  const outcome = new VisitorAnalysisPipeline().evaluate(makeTransport(), parseFingerprint(fingerprint), {
    now: FIXED_NOW,
  });
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.report;
}

const request: LoggedRequest = {
  path: '/analyze',
  method: 'POST',
  headers: {
    'user-agent': 'Mozilla/5.0 (test)',
    authorization: 'Bearer test-secret',
    cookie: 'session=test-session',
    accept: 'application/json',
  },
};

describe('AnalysisLogger', () => {
  let dataDir: string;
  let logger: AnalysisLogger;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'analysis-log-'));
    logger = new AnalysisLogger(dataDir);
  });

  afterEach(async () => {
    await logger.close();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('should write to analysis.log inside the data directory', () => {
    expect(logger.getLogFile()).toBe(path.join(dataDir, 'analysis.log'));
  });

  it('should build correlation contexts from the request', () => {
    const context = logger.createCorrelationContext(request, '203.0.113.10', 'corr-42');
    const anonymous = logger.createCorrelationContext({ ...request, headers: {} }, '203.0.113.11');

    expect(context).toEqual(
      expect.objectContaining({ correlationId: 'corr-42', ip: '203.0.113.10', userAgent: 'Mozilla/5.0 (test)' }),
    );
    expect(anonymous.userAgent).toBe('unknown');
    expect(anonymous.correlationId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should log the start of an analysis with redacted headers', async () => {
    const context = logger.createCorrelationContext(request, '203.0.113.10', 'corr-1');

    logger.logAnalysisStart(context, request);
    await logger.close();

    const [entry] = readEntries(logger.getLogFile());
    expect(entry).toMatchObject({
      correlationId: 'corr-1',
      level: 'info',
      event: 'ANALYSIS_START',
      path: '/analyze',
      method: 'POST',
      metadata: {
        headers: {
          'user-agent': 'Mozilla/5.0 (test)',
          authorization: '[REDACTED]',
          cookie: '[REDACTED]',
          accept: 'application/json',
        },
      },
    });
    expect(logger.getAnalytics().totalRequests).toBe(1);
  });

  it('should log flagged visits as suspicious and track the verdicts', async () => {
    const context = logger.createCorrelationContext(request, '203.0.113.10', 'corr-2');

    logger.logAnalysisComplete(context, reportFor({}), 12, request);
    logger.logAnalysisComplete(context, reportFor(HUMAN_FINGERPRINT), 4, request);
    await logger.close();

    const entries = readEntries(logger.getLogFile());
    expect(entries.map(entry => [entry.level, entry.event])).toEqual([
      ['warn', 'SUSPICIOUS_VISIT'],
      ['info', 'VISIT_ANALYZED'],
    ]);
    expect(entries[0].riskAssessment?.totalScore).toBe(35);
    expect(entries[0].metadata).toEqual({ redFlagCount: 1, consistencyFailures: 1 });

    const analytics = logger.getAnalytics();
    expect(analytics.completedAnalyses).toBe(2);
    expect(analytics.nonGenuineVisits).toBe(1);
    expect(analytics.riskLevelCounts).toEqual({ minimal: 1, low: 0, medium: 1, high: 0, critical: 0 });
    expect(analytics.averageProcessingTime).toBe(8);
  });

  it('should count malformed payloads and failures', async () => {
    const context = logger.createCorrelationContext(request, '203.0.113.10', 'corr-3');

    logger.logMalformedPayload(context, 'Fingerprint is not a JSON object', request);
    logger.logAnalysisError(context, new Error('boom'), request);
    await logger.close();

    const entries = readEntries(logger.getLogFile());
    expect(entries[0]).toMatchObject({ event: 'MALFORMED_PAYLOAD', level: 'warn', error: 'Fingerprint is not a JSON object' });
    expect(entries[1]).toMatchObject({ event: 'ANALYSIS_ERROR', level: 'error', error: 'boom' });
    expect(logger.getAnalytics()).toMatchObject({ malformedPayloads: 1, failedAnalyses: 1 });
  });

  it('should reset the analytics', () => {
    logger.logAnalysisStart(logger.createCorrelationContext(request, '203.0.113.10'), request);

    logger.resetAnalytics();

    expect(logger.getAnalytics().totalRequests).toBe(0);
  });

  it('should hand out analytics copies', () => {
    const analytics = logger.getAnalytics();
    analytics.riskLevelCounts.critical = 9;

    expect(logger.getAnalytics().riskLevelCounts.critical).toBe(0);
  });
});

describe('rotateFile', () => {
  let dir: string;
  const now = new Date('2024-05-01T12:00:00.000Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rotate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should rename the live file with the current date', () => {
    fs.writeFileSync(path.join(dir, 'app.log'), 'yesterday\n');

    rotateFile({ dir, filename: 'app.log', now });

    expect(fs.readdirSync(dir)).toEqual(['app-2024-05-01.log']);
  });

  it('should rotate at most once per day', () => {
    fs.writeFileSync(path.join(dir, 'app-2024-05-01.log'), 'morning\n');
    fs.writeFileSync(path.join(dir, 'app.log'), 'afternoon\n');

    rotateFile({ dir, filename: 'app.log', now });

    expect(fs.readFileSync(path.join(dir, 'app.log'), 'utf8')).toBe('afternoon\n');
    expect(fs.readFileSync(path.join(dir, 'app-2024-05-01.log'), 'utf8')).toBe('morning\n');
  });

  it('should delete only rotated copies past the retention period', () => {
    for (const name of ['app-2024-04-01.log', 'app-2024-04-28.log', 'other-2020-01-01.log']) {
      fs.writeFileSync(path.join(dir, name), '');
    }

    const deleted = rotateFile({ dir, filename: 'app.log', retentionDays: 7, now });

    expect(deleted).toEqual(['app-2024-04-01.log']);
    expect(fs.readdirSync(dir).sort()).toEqual(['app-2024-04-28.log', 'other-2020-01-01.log']);
  });
});

describe('installConsoleTee', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tee-'));
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should copy console output into the log file and restore the console', async () => {
    const original = console.info;
    const logFile = path.join(dir, 'app.log');

    const restore = installConsoleTee({ logFile });
    console.info('visit', 42);
    console.error('failed');
    await restore();

    const lines = fs.readFileSync(logFile, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] visit 42$/);
    expect(lines[1]).toMatch(/\[ERROR\] failed$/);
    expect(console.info).toBe(original);
    expect(original).toHaveBeenCalledWith('visit', 42);
  });
});
