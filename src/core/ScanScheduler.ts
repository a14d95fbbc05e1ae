import { PortLister } from '../types/capabilities';
import { DeviceRegistry } from './DeviceRegistry';
import { IdentifyPool } from './IdentifyPool';
import { diffPorts } from './portDiff';
import { EnumerationError, errorMessage } from './errors';
import { TaggedLogger } from './EngineLog';

export interface TickReport {
  ok: boolean;
  at: number;
  ports: number;
  appeared: string[];
  disappeared: string[];
  dispatched: string[];
  error?: string;
}

/**
 * 扫描调度器：按固定周期枚举串口，与登记表比较后派发识别 / 标记移除
 * tick 之间不重叠；tick 本身不等待任何识别结果
 */
export class ScanScheduler {
  private lister: PortLister;
  private registry: DeviceRegistry;
  private pool: IdentifyPool;
  private intervalMs: number;
  private log: TaggedLogger;

  private timer: NodeJS.Timeout | null = null;
  private ticking: Promise<TickReport> | null = null;
  private lastReport: TickReport | null = null;

  constructor(opts: {
    lister: PortLister;
    registry: DeviceRegistry;
    pool: IdentifyPool;
    intervalMs: number;
    log?: TaggedLogger;
  }) {
    this.lister = opts.lister;
    this.registry = opts.registry;
    this.pool = opts.pool;
    this.intervalMs = Math.max(10, opts.intervalMs);
    this.log = opts.log ?? (() => undefined);
  }

  public start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      // 上一次枚举还没返回时跳过本轮
      if (this.ticking) return;
      this.tick().catch(e => this.log('error', `tick crashed: ${errorMessage(e)}`));
    }, this.intervalMs);
    this.log('info', `scan started, interval=${this.intervalMs}ms`);
  }

  /**
   * 停止周期扫描，并等待进行中的 tick 结束
   */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log('info', 'scan stopped');
    }
    if (this.ticking) {
      await this.ticking.catch(e => this.log('debug', `pending tick failed: ${errorMessage(e)}`));
    }
  }

  public isRunning(): boolean {
    return this.timer !== null;
  }

  public getLastReport(): TickReport | null {
    return this.lastReport;
  }

  public tick(): Promise<TickReport> {
    if (this.ticking) return this.ticking;
    const p = this.runTick().finally(() => {
      this.ticking = null;
    });
    this.ticking = p;
    return p;
  }

  private async runTick(): Promise<TickReport> {
    const at = Date.now();
    let snapshot: string[];
    try {
      snapshot = await this.lister.listPorts();
    } catch (e) {
      const err = e instanceof EnumerationError ? e : new EnumerationError(`list ports failed: ${errorMessage(e)}`, { cause: e });
      this.log('warn', err.message);
      const report: TickReport = { ok: false, at, ports: 0, appeared: [], disappeared: [], dispatched: [], error: err.message };
      this.lastReport = report;
      return report;
    }

    const { appeared, disappeared } = diffPorts(snapshot, this.registry.activePortIds());
    const dispatched: string[] = [];

    for (const portId of disappeared) {
      this.pool.cancel(portId);
      const res = this.registry.apply({ kind: 'remove', portId, cause: 'unplugged', at: Date.now() });
      if (res.applied) this.log('info', `${portId} removed`);
    }

    for (const portId of appeared) {
      const seen = this.registry.apply({ kind: 'appear', portId, at: Date.now() });
      if (!seen.applied) continue;
      const started = this.registry.apply({ kind: 'dispatch', portId, at: Date.now() });
      if (!started.applied) continue;
      this.pool.submit(portId, started.record.cycle);
      dispatched.push(portId);
      this.log('info', `${portId} appeared (cycle ${started.record.cycle}), identification queued`);
    }

    const report: TickReport = { ok: true, at, ports: snapshot.length, appeared, disappeared, dispatched };
    this.lastReport = report;
    return report;
  }
}
