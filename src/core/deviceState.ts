import { DeviceMutation, DeviceRecord, MutationReason } from '../types/device';

/**
 * 设备记录状态机
 *
 * pending -> reading -> success | failed
 * failed(已安排重试) -> reading
 * 任意活跃状态 -> removed
 * removed -> pending（端口重新出现，开启新一轮识别）
 * success / failed(重试耗尽) -> pending（仅限显式 reset）
 *
 * 纯函数，不做任何 IO；Registry 负责串行调用并广播结果。
 */

export type MutationResult =
  | { ok: true; record: DeviceRecord; created: boolean }
  | { ok: false; code: 'race' | 'invalid'; reason: string };

export function reasonOf(m: DeviceMutation): MutationReason {
  switch (m.kind) {
    case 'appear':
    case 'dispatch':
      return 'scheduler-dispatch';
    case 'attempt':
    case 'succeed':
    case 'fail':
      return 'worker-result';
    case 'remove':
      return 'scheduler-removal';
    case 'reset':
      return 'user-action';
  }
}

export function isRetryScheduled(r: DeviceRecord): boolean {
  return r.status === 'failed' && typeof r.nextAttemptAt === 'number';
}

// 终态：不会再有自动处理
export function isTerminal(r: DeviceRecord): boolean {
  if (r.status === 'success' || r.status === 'removed') return true;
  return r.status === 'failed' && !isRetryScheduled(r);
}

function invalid(reason: string): MutationResult {
  return { ok: false, code: 'invalid', reason };
}

function race(reason: string): MutationResult {
  return { ok: false, code: 'race', reason };
}

// 开启新一轮识别：保留首次出现时间，旧 MAC 转存到 previousMac
function freshCycle(r: DeviceRecord, at: number): DeviceRecord {
  return {
    portId: r.portId,
    status: 'pending',
    previousMac: r.mac ?? r.previousMac,
    firstSeen: r.firstSeen,
    lastAttempt: r.lastAttempt,
    attemptCount: 0,
    cycle: r.cycle + 1,
    updatedAt: at
  };
}

// worker 结果只能落在同一轮、且仍处于 reading 的记录上
function checkWorkerTarget(r: DeviceRecord | undefined, cycle: number): string | null {
  if (!r) return 'unknown port';
  if (r.status === 'removed') return 'port removed';
  if (r.cycle !== cycle) return `stale cycle ${cycle} (current ${r.cycle})`;
  if (r.status !== 'reading') return `status is ${r.status}`;
  return null;
}

export function applyMutation(current: DeviceRecord | undefined, m: DeviceMutation): MutationResult {
  switch (m.kind) {
    case 'appear': {
      if (!current) {
        return {
          ok: true,
          created: true,
          record: {
            portId: m.portId,
            status: 'pending',
            firstSeen: m.at,
            attemptCount: 0,
            cycle: 1,
            updatedAt: m.at
          }
        };
      }
      if (current.status !== 'removed') return invalid(`already active (${current.status})`);
      return { ok: true, created: false, record: freshCycle(current, m.at) };
    }

    case 'dispatch': {
      if (!current) return invalid('unknown port');
      if (current.status !== 'pending' && !isRetryScheduled(current)) {
        return current.status === 'removed' ? race('port removed') : invalid(`cannot dispatch from ${current.status}`);
      }
      const { lastError: _e, nextAttemptAt: _n, ...rest } = current;
      return { ok: true, created: false, record: { ...rest, status: 'reading', updatedAt: m.at } };
    }

    case 'attempt': {
      const why = checkWorkerTarget(current, m.cycle);
      if (why || !current) return race(why ?? 'unknown port');
      return {
        ok: true,
        created: false,
        record: { ...current, attemptCount: current.attemptCount + 1, lastAttempt: m.at, updatedAt: m.at }
      };
    }

    case 'succeed': {
      const why = checkWorkerTarget(current, m.cycle);
      if (why || !current) return race(why ?? 'unknown port');
      if (!m.mac) return invalid('empty mac');
      return { ok: true, created: false, record: { ...current, status: 'success', mac: m.mac, updatedAt: m.at } };
    }

    case 'fail': {
      const why = checkWorkerTarget(current, m.cycle);
      if (why || !current) return race(why ?? 'unknown port');
      const record: DeviceRecord = { ...current, status: 'failed', lastError: m.error, updatedAt: m.at };
      if (typeof m.retryAt === 'number') record.nextAttemptAt = m.retryAt;
      return { ok: true, created: false, record };
    }

    case 'remove': {
      if (!current) return invalid('unknown port');
      if (current.status === 'removed') return invalid('already removed');
      const { mac, lastError: _e, nextAttemptAt: _n, ...rest } = current;
      return {
        ok: true,
        created: false,
        record: {
          ...rest,
          status: 'removed',
          previousMac: mac ?? current.previousMac,
          removalCause: m.cause,
          updatedAt: m.at
        }
      };
    }

    case 'reset': {
      if (!current) return invalid('unknown port');
      if (current.status === 'removed') return invalid('port is not attached');
      if (!isTerminal(current)) return invalid(`identification still in progress (${current.status})`);
      return { ok: true, created: false, record: freshCycle(current, m.at) };
    }
  }
}
