import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { EventLogger } from '../src/infra/logger.js';

describe('EventLogger', () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  it('appends one JSON record per line', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'governance-log-'));
    tempDirs.push(dir);
    const file = path.join(dir, 'logs', 'events.ndjson');

    const logger = new EventLogger(file);
    await logger.init();
    logger.enqueue('info', 'proposal.created', { proposalId: 1 });
    await logger.log('warn', 'shutdown.start', { signal: 'SIGTERM' });

    const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 'info', event: 'proposal.created', data: { proposalId: 1 } });
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'warn', event: 'shutdown.start', data: { signal: 'SIGTERM' } });
  });

  it('keeps recent records in memory', async () => {
    const logger = new EventLogger(null);
    await logger.log('info', 'a');
    await logger.log('info', 'b');
    await logger.log('error', 'c', { reason: 'test' });

    expect(logger.recent(2).map((record) => record.event)).toEqual(['b', 'c']);
    expect(logger.recent(1)[0].data).toEqual({ reason: 'test' });
  });

  it('surfaces a failed write on flush', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'governance-log-'));
    tempDirs.push(dir);

    // The log path is a directory, so appending fails.
    const logger = new EventLogger(dir);
    logger.enqueue('info', 'proposal.created');

    await expect(logger.flush()).rejects.toThrow();
    await expect(logger.flush()).resolves.toBeUndefined();
  });
});
