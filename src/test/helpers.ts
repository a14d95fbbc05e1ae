import { EngineLog } from '../core/EngineLog';
import { DeviceRegistry } from '../core/DeviceRegistry';

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

// 轮询直到条件成立，超时抛错
export async function waitFor(cond: () => boolean, timeoutMs = 2000, label = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!cond()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${label}`);
    await sleep(5);
  }
}

export function quietLog(): EngineLog {
  return new EngineLog({ echo: false });
}

export function newRegistry(logs: EngineLog = quietLog()): DeviceRegistry {
  return new DeviceRegistry({ log: logs.tagged('Registry') });
}

// 按路径读取 JSON 响应里的字段，路径不存在时返回 undefined
export function pick(value: unknown, ...keys: Array<string | number>): unknown {
  let cur: unknown = value;
  for (const k of keys) {
    if (Array.isArray(cur) && typeof k === 'number') {
      cur = cur[k];
    } else if (cur && typeof cur === 'object' && !Array.isArray(cur)) {
      cur = Object.entries(cur).find(([name]) => name === String(k))?.[1];
    } else {
      return undefined;
    }
  }
  return cur;
}
