import * as fs from 'fs/promises';
import * as path from 'path';
import { createHmac } from 'crypto';
import { AuditEvent, AuditService, FileAuditTransport } from '../../core/utils/AuditService';
import { stableStringify } from '../../core/utils/stableStringify';
import { MemoryAuditTransport } from './helpers/fakes';

describe('AuditService', () => {
  const fixturesDir = path.resolve(__dirname, 'fixtures');
  const logFile = path.join(fixturesDir, 'audit.log');

  beforeAll(async () => {
    await fs.mkdir(fixturesDir, { recursive: true });
    await fs.rm(logFile, { force: true });
  });

  it('écrit un événement JSONL sans signature', async () => {
    const service = new AuditService([new FileAuditTransport(logFile)]);
    await service.log({
      actor: 'test',
      event: 'TEST_EVENT',
      resource: 'res1',
      status: 'SUCCESS',
      details: { foo: 'bar' },
    });

    const lines = (await fs.readFile(logFile, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);

    const entry: AuditEvent = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ actor: 'test', event: 'TEST_EVENT', resource: 'res1', status: 'SUCCESS', details: { foo: 'bar' } });
    expect(entry.hmac).toBeUndefined();
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('signe les événements quand une clé est fournie', async () => {
    const transport = new MemoryAuditTransport();
    const service = new AuditService([transport], 'test-secret');
    await service.log({ actor: 'test', event: 'TEST_HMAC', resource: 'res2', details: { b: 2, a: 1 } });

    const { hmac, ...signed } = transport.events[0];
    expect(hmac).toBe(createHmac('sha256', 'test-secret').update(stableStringify(signed)).digest('hex'));
  });

  it("n'émet rien sans transport", async () => {
    const service = AuditService.fromSettings({ AUDIT_ENABLED: false, AUDIT_LOG_FILE: logFile });
    expect(service.enabled).toBe(false);
    await expect(service.log({ actor: 'test', event: 'IGNORED' })).resolves.toBeUndefined();
  });

  it('corrèle début, étapes et fin de run', async () => {
    const transport = new MemoryAuditTransport();
    const service = new AuditService([transport]);

    const { runId } = await service.beginRun({ actor: 'CommentHistoryManager', params: { jql: 'project = PRJ' } });
    await service.logStep(runId, 'FETCH_DONE', 'Exported 2 comments from 1 issues', { cachedUsers: 1 });
    await service.endRun(runId, 'FAILURE', new Error('boom'), { issues: 1 });

    expect(transport.events.map((e) => [e.event, e.status])).toEqual([
      ['EXTRACTION_RUN_START', 'STARTED'],
      ['EXTRACTION_STEP', 'INFO'],
      ['EXTRACTION_RUN_END', 'FAILURE'],
    ]);
    expect(transport.events.every((e) => e.details?.run_id === runId)).toBe(true);
    expect(transport.events[0].details).toEqual({ params: { jql: 'project = PRJ' }, run_id: runId });
    expect(transport.events[1].details).toEqual({ step: 'FETCH_DONE', message: 'Exported 2 comments from 1 issues', run_id: runId, cachedUsers: 1 });
    expect(transport.events[2].details).toMatchObject({ run_id: runId, issues: 1, error: { name: 'Error', message: 'boom' } });
  });
});
