import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { acquireInstanceLock, InstanceLockedError, isPidAlive } from '../../core/instanceLock';

function tmpFilePath(prefix: string) {
  const id = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  return path.join(os.tmpdir(), `${prefix}-${id}.json`);
}

test('acquireInstanceLock is exclusive and releasable', () => {
  const lockPath = tmpFilePath('server-lock');
  const a = acquireInstanceLock(lockPath, { httpPort: 9001 });
  assert.ok(fs.existsSync(lockPath));
  const content: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
  assert.ok(content && typeof content === 'object' && 'pid' in content && content.pid === process.pid);

  assert.throws(
    () => acquireInstanceLock(lockPath),
    (e: unknown) => e instanceof InstanceLockedError && e.code === 'ELOCKED' && e.lockedPid === process.pid
  );

  a.release();
  a.release();
  assert.ok(!fs.existsSync(lockPath));

  const b = acquireInstanceLock(lockPath);
  b.release();
});

test('a lock left by a dead process is taken over', () => {
  const lockPath = tmpFilePath('server-lock-stale');
  // pid 2^22 以上在 Linux 上不会分配
  fs.writeFileSync(lockPath, JSON.stringify({ pid: 99999999, createdAt: new Date().toISOString() }), 'utf8');
  assert.equal(isPidAlive(99999999), false);

  const lock = acquireInstanceLock(lockPath);
  const content: unknown = JSON.parse(fs.readFileSync(lockPath, 'utf8'));
  assert.ok(content && typeof content === 'object' && 'pid' in content && content.pid === process.pid);
  lock.release();
});

test('a corrupt lock file is replaced', () => {
  const lockPath = tmpFilePath('server-lock-corrupt');
  fs.writeFileSync(lockPath, '{not json', 'utf8');
  const lock = acquireInstanceLock(lockPath);
  assert.ok(fs.existsSync(lockPath));
  lock.release();
});
