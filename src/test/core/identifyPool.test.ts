import test from 'node:test';
import assert from 'node:assert/strict';
import { IdentifyPool, PoolSettings } from '../../core/IdentifyPool';
import { DeviceRegistry } from '../../core/DeviceRegistry';
import { MockIdentifier } from '../../adapters/mock';
import type { DeviceIdentifier } from '../../types/capabilities';
import { newRegistry, quietLog, sleep, waitFor } from '../helpers';

const BASE: PoolSettings = {
  concurrency: 2,
  attemptTimeoutMs: 1000,
  maxAttempts: 3,
  backoff: { baseDelayMs: 1, maxDelayMs: 1 }
};

function makePool(
  identifier: DeviceIdentifier,
  settings: Partial<PoolSettings> = {},
  registry: DeviceRegistry = newRegistry(),
  held?: Map<string, Promise<void>>
) {
  const logs = quietLog();
  const pool = new IdentifyPool({ registry, identifier, settings: { ...BASE, ...settings }, log: logs.tagged('Pool'), held });
  return { pool, registry, logs };
}

// 模拟调度器：登记端口并提交首次识别
function enqueue(registry: DeviceRegistry, pool: IdentifyPool, portId: string): void {
  registry.apply({ kind: 'appear', portId, at: Date.now() });
  const started = registry.apply({ kind: 'dispatch', portId, at: Date.now() });
  assert.ok(started.applied);
  pool.submit(portId, started.record.cycle);
}

test('pool never runs more than concurrency identifications', async () => {
  const identifier = new MockIdentifier(() => ({ mac: 'aa:bb:cc:dd:ee:ff', delayMs: 20 }));
  const { pool, registry } = makePool(identifier, { concurrency: 2 });
  for (const p of ['COM1', 'COM2', 'COM3', 'COM4', 'COM5']) enqueue(registry, pool, p);

  assert.deepEqual(pool.stats(), { running: 2, queued: 3, retryQueued: 0, waitingRetry: 0, accepting: true });
  await pool.whenIdle();

  assert.equal(identifier.maxConcurrent, 2);
  assert.equal(identifier.calls.length, 5);
  assert.ok(registry.list().every(r => r.status === 'success' && r.attemptCount === 1));
});

test('failed attempt is retried and reaches success', async () => {
  const identifier = new MockIdentifier().script('COM3', { error: 'DISCONNECTED' }, { mac: 'AABBCCDDEEFF' });
  const { pool, registry } = makePool(identifier);
  const statuses: string[] = [];
  registry.subscribe(e => statuses.push(e.record.status));

  enqueue(registry, pool, 'COM3');
  await pool.whenIdle();

  assert.deepEqual(statuses, ['pending', 'reading', 'failed', 'reading', 'success']);
  const r = registry.get('COM3');
  assert.equal(r?.mac, 'aa:bb:cc:dd:ee:ff');
  assert.equal(r?.attemptCount, 2);
  assert.equal(r?.lastError, undefined);
});

test('retries stop at maxAttempts with a terminal failure', async () => {
  const identifier = new MockIdentifier().script('COM4', { error: 'TIMEOUT' }, { error: 'TIMEOUT' }, { error: 'TIMEOUT' });
  const { pool, registry, logs } = makePool(identifier, { maxAttempts: 3 });

  enqueue(registry, pool, 'COM4');
  await pool.whenIdle();

  const r = registry.get('COM4');
  assert.equal(r?.status, 'failed');
  assert.equal(r?.attemptCount, 3);
  assert.equal(r?.lastError, 'TIMEOUT: timeout');
  assert.equal(r?.nextAttemptAt, undefined);
  assert.equal(identifier.callsFor('COM4'), 3);
  assert.deepEqual(logs.getRecent(10, 'error').map(e => e.msg), [
    'COM4 identification failed after 3 attempt(s): TIMEOUT: timeout'
  ]);
});

test('attempt timeout aborts the identifier and counts as TIMEOUT', async () => {
  const identifier = new MockIdentifier().script('COM3', { hang: true });
  const { pool, registry } = makePool(identifier, { attemptTimeoutMs: 30, maxAttempts: 1 });

  enqueue(registry, pool, 'COM3');
  await pool.whenIdle();

  const r = registry.get('COM3');
  assert.equal(r?.status, 'failed');
  assert.equal(r?.lastError, 'TIMEOUT: no response within 30ms');
  assert.deepEqual(identifier.aborted, ['COM3']);
});

test('malformed mac is a protocol error', async () => {
  const identifier = new MockIdentifier().script('COM3', { mac: 'not-a-mac' });
  const { pool, registry } = makePool(identifier, { maxAttempts: 1 });

  enqueue(registry, pool, 'COM3');
  await pool.whenIdle();

  assert.equal(registry.get('COM3')?.lastError, 'PROTOCOL_ERROR: malformed mac "not-a-mac"');
});

test('fresh ports take free slots before queued retries', async () => {
  const identifier = new MockIdentifier()
    .script('A', { error: 'TIMEOUT' }, { mac: '11:11:11:11:11:11' })
    .script('X', { mac: '22:22:22:22:22:22', delayMs: 150 })
    .script('Y', { mac: '33:33:33:33:33:33' });
  const { pool, registry } = makePool(identifier, { concurrency: 1, backoff: { baseDelayMs: 40, maxDelayMs: 40 } });

  enqueue(registry, pool, 'A');
  await waitFor(() => registry.get('A')?.status === 'failed', 1000, 'A to fail');
  enqueue(registry, pool, 'X');
  await waitFor(() => pool.stats().retryQueued === 1, 1000, 'A retry to queue');
  enqueue(registry, pool, 'Y');
  await pool.whenIdle();

  assert.deepEqual(identifier.calls, ['A', 'X', 'Y', 'A']);
  assert.ok(registry.list().every(r => r.status === 'success'));
});

test('cancel aborts the running identification and is idempotent', async () => {
  const identifier = new MockIdentifier().script('COM3', { hang: true });
  const { pool, registry } = makePool(identifier);

  enqueue(registry, pool, 'COM3');
  await waitFor(() => identifier.calls.length === 1);
  assert.equal(pool.isBusy('COM3'), true);

  registry.apply({ kind: 'remove', portId: 'COM3', cause: 'unplugged', at: Date.now() });
  pool.cancel('COM3');
  pool.cancel('COM3');
  await pool.whenIdle();

  assert.equal(pool.isBusy('COM3'), false);
  assert.deepEqual(identifier.aborted, ['COM3']);
  assert.equal(registry.get('COM3')?.status, 'removed');
  assert.equal(registry.get('COM3')?.mac, undefined);
});

test('cancel drops a pending retry', async () => {
  const identifier = new MockIdentifier().script('COM3', { error: 'DISCONNECTED' }, { mac: 'aa:bb:cc:dd:ee:ff' });
  const { pool, registry } = makePool(identifier, { backoff: { baseDelayMs: 200, maxDelayMs: 200 } });

  enqueue(registry, pool, 'COM3');
  await waitFor(() => pool.stats().waitingRetry === 1, 1000, 'retry timer');
  registry.apply({ kind: 'remove', portId: 'COM3', cause: 'unplugged', at: Date.now() });
  pool.cancel('COM3');
  await pool.whenIdle();
  await sleep(250);

  assert.equal(identifier.callsFor('COM3'), 1);
  assert.equal(registry.get('COM3')?.status, 'removed');
});

test('a cancelled identification keeps its port until the call returns', async () => {
  let active = 0;
  let maxActive = 0;
  let n = 0;
  // 不理会 abort 的识别器，模拟无法立即中止的外部进程
  const stubborn: DeviceIdentifier = {
    async identify() {
      n += 1;
      const mac = `aa:bb:cc:00:00:0${n}`;
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(60);
      active -= 1;
      return mac;
    }
  };
  const { pool, registry } = makePool(stubborn);

  enqueue(registry, pool, 'COM3');
  await waitFor(() => n === 1);
  pool.cancel('COM3');
  registry.apply({ kind: 'remove', portId: 'COM3', cause: 'unplugged', at: Date.now() });
  enqueue(registry, pool, 'COM3');

  assert.equal(pool.stats().queued, 1);
  await pool.whenIdle();

  assert.equal(maxActive, 1);
  const r = registry.get('COM3');
  assert.equal(r?.cycle, 2);
  assert.equal(r?.status, 'success');
  assert.equal(r?.mac, 'aa:bb:cc:00:00:02');
  assert.equal(r?.previousMac, undefined);
});

test('shutdown cancels everything and rejects new work', async () => {
  const identifier = new MockIdentifier(() => ({ hang: true }));
  const { pool, registry } = makePool(identifier, { concurrency: 1 });
  enqueue(registry, pool, 'COM1');
  enqueue(registry, pool, 'COM2');
  await waitFor(() => identifier.calls.length === 1);

  await pool.shutdown(500);

  assert.deepEqual(identifier.aborted, ['COM1']);
  assert.deepEqual(identifier.calls, ['COM1']);
  assert.equal(pool.submit('COM3', 1), false);
  assert.equal(pool.stats().running, 0);
  assert.equal(pool.stats().accepting, false);
});

test('shutdown abandons identifications that outlive the grace period', async () => {
  const never: DeviceIdentifier = {
    identify: () => new Promise<string>(() => undefined)
  };
  const { pool, registry, logs } = makePool(never);
  enqueue(registry, pool, 'COM3');
  await sleep(5);

  const started = Date.now();
  await pool.shutdown(40);
  assert.ok(Date.now() - started >= 30);
  await pool.whenIdle();

  assert.deepEqual(logs.getRecent(10, 'warn').map(e => e.msg), ['abandon 1 identification(s) after 40ms grace period']);
  assert.equal(registry.get('COM3')?.status, 'reading');
});

test('shutdown clears its grace timer once identifications settle', async () => {
  const identifier = new MockIdentifier(() => ({ hang: true }));
  const { pool, registry } = makePool(identifier, { concurrency: 1 });
  enqueue(registry, pool, 'COM1');
  await waitFor(() => identifier.calls.length === 1);

  // 此时仅剩该作业的超时定时器
  const countTimers = () => process.getActiveResourcesInfo().filter(r => r === 'Timeout').length;
  const before = countTimers();
  const started = Date.now();
  await pool.shutdown(60_000);

  assert.ok(Date.now() - started < 1000);
  assert.equal(countTimers(), before - 1);
});

test('an identification abandoned at shutdown holds its port in the next pool', async () => {
  let active = 0;
  let maxActive = 0;
  let n = 0;
  const stubborn: DeviceIdentifier = {
    async identify() {
      n += 1;
      const mac = `aa:bb:cc:00:00:0${n}`;
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(n === 1 ? 100 : 1);
      active -= 1;
      return mac;
    }
  };
  const registry = newRegistry();
  const held = new Map<string, Promise<void>>();
  const first = makePool(stubborn, {}, registry, held);
  enqueue(registry, first.pool, 'COM3');
  await waitFor(() => n === 1);
  await first.pool.shutdown(10);
  assert.deepEqual([...held.keys()], ['COM3']);
  registry.apply({ kind: 'remove', portId: 'COM3', cause: 'shutdown', at: Date.now() });

  const second = makePool(stubborn, {}, registry, held);
  enqueue(registry, second.pool, 'COM3');
  assert.deepEqual(second.pool.stats(), { running: 0, queued: 1, retryQueued: 0, waitingRetry: 0, accepting: true });
  await second.pool.whenIdle();

  assert.equal(maxActive, 1);
  assert.equal(held.size, 0);
  const r = registry.get('COM3');
  assert.equal(r?.cycle, 2);
  assert.equal(r?.status, 'success');
  assert.equal(r?.mac, 'aa:bb:cc:00:00:02');
});
