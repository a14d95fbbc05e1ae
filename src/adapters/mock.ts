/**
 * 内存版串口枚举与识别，用于测试和无硬件调试（MOCK_DEVICES=COM3,COM4）
 */

import crypto from 'crypto';
import type { DeviceIdentifier, IdentifyOptions, PortLister } from '../types/capabilities';
import { CancelledError, IdentifyError, IdentifyErrorCode } from '../core/errors';

export class MockPortLister implements PortLister {
  private ports: string[];
  private failures = 0;
  public listCalls = 0;

  constructor(ports: string[] = []) {
    this.ports = [...ports];
  }

  async listPorts(): Promise<string[]> {
    this.listCalls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('mock enumeration failure');
    }
    return [...this.ports];
  }

  setPorts(ports: string[]): void {
    this.ports = [...ports];
  }

  // 接下来 n 次 listPorts 抛错
  failNext(n = 1): void {
    this.failures += n;
  }
}

export type MockOutcome =
  | { mac: string; delayMs?: number }
  | { error: IdentifyErrorCode; message?: string; delayMs?: number }
  | { hang: true };

// 按端口名生成稳定的假 MAC（乐鑫 OUI 24:0a:c4）
export function fakeMacFor(portId: string): string {
  const h = crypto.createHash('sha1').update(portId).digest();
  return ['24', '0a', 'c4', ...Array.from(h.subarray(0, 3), b => b.toString(16).padStart(2, '0'))].join(':');
}

export class MockIdentifier implements DeviceIdentifier {
  private scripts: Map<string, MockOutcome[]> = new Map();
  private fallback: ((portId: string) => MockOutcome) | null;
  private active: Map<string, number> = new Map();
  private activeTotal = 0;

  public calls: string[] = [];
  public maxConcurrent = 0;
  public maxConcurrentPerPort = 0;
  public aborted: string[] = [];

  constructor(fallback?: (portId: string) => MockOutcome) {
    this.fallback = fallback ?? null;
  }

  // 为端口安排依次返回的结果；用完后使用 fallback
  script(portId: string, ...outcomes: MockOutcome[]): this {
    const list = this.scripts.get(portId) || [];
    list.push(...outcomes);
    this.scripts.set(portId, list);
    return this;
  }

  callsFor(portId: string): number {
    return this.calls.filter(p => p === portId).length;
  }

  async identify(portId: string, opts: IdentifyOptions): Promise<string> {
    this.calls.push(portId);
    const outcome = this.next(portId);
    this.enter(portId);
    try {
      return await this.play(portId, outcome, opts.signal);
    } finally {
      this.leave(portId);
    }
  }

  private next(portId: string): MockOutcome {
    const list = this.scripts.get(portId);
    const scripted = list?.shift();
    if (scripted) return scripted;
    if (this.fallback) return this.fallback(portId);
    return { error: 'DISCONNECTED', message: `no mock device on ${portId}` };
  }

  private enter(portId: string): void {
    const n = (this.active.get(portId) || 0) + 1;
    this.active.set(portId, n);
    this.activeTotal++;
    this.maxConcurrentPerPort = Math.max(this.maxConcurrentPerPort, n);
    this.maxConcurrent = Math.max(this.maxConcurrent, this.activeTotal);
  }

  private leave(portId: string): void {
    const n = (this.active.get(portId) || 1) - 1;
    if (n <= 0) this.active.delete(portId);
    else this.active.set(portId, n);
    this.activeTotal--;
  }

  private play(portId: string, outcome: MockOutcome, signal: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const onAbort = () => {
        if (timer) clearTimeout(timer);
        this.aborted.push(portId);
        reject(new CancelledError());
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      if ('hang' in outcome) return;

      const mac = 'mac' in outcome ? outcome.mac : null;
      const error = 'error' in outcome ? new IdentifyError(outcome.error, outcome.message || outcome.error.toLowerCase()) : null;
      const settle = () => {
        signal.removeEventListener('abort', onAbort);
        if (error) reject(error);
        else resolve(mac ?? '');
      };
      timer = setTimeout(settle, Math.max(0, outcome.delayMs ?? 0));
    });
  }
}
