import type { DeviceIdentifier, PortLister } from '../types/capabilities';
import type { EngineSettingsV1 } from '../types/settings';
import type { DeviceRecord, DeviceStatus } from '../types/device';
import { DeviceRegistry } from './DeviceRegistry';
import { IdentifyPool, PoolStats } from './IdentifyPool';
import { ScanScheduler, TickReport } from './ScanScheduler';
import { EngineLog, TaggedLogger } from './EngineLog';
import { isRetryScheduled } from './deviceState';
import { InvalidActionError, NotFoundError, errorMessage } from './errors';
import { DeviceQueryService } from '../services/DeviceQueryService';

export interface EngineAdapters {
  createLister(settings: EngineSettingsV1): PortLister;
  createIdentifier(settings: EngineSettingsV1): DeviceIdentifier;
}

export interface EngineState {
  running: boolean;
  startedAt?: number;
  stoppedAt?: number;
  lastTick: TickReport | null;
  pool: PoolStats | null;
  counts: Record<DeviceStatus, number>;
}

export type EngineStateListener = (state: EngineState) => void;

interface RunSession {
  scheduler: ScanScheduler;
  pool: IdentifyPool;
  startedAt: number;
}

/**
 * 发现引擎：持有登记表，按启动 / 停止管理一次监测会话（调度器 + 作业池）
 *
 * 登记表跨会话保留，停止后仍可查询和导出。
 */
export class DiscoveryEngine {
  public readonly registry: DeviceRegistry;
  public readonly query: DeviceQueryService;
  public readonly logs: EngineLog;

  private adapters: EngineAdapters;
  private settings: EngineSettingsV1;
  private session: RunSession | null = null;
  private stopping: Promise<void> | null = null;
  private stoppedAt?: number;
  private lastTick: TickReport | null = null;
  private stateListeners: Set<EngineStateListener> = new Set();
  // 停止时被放弃但尚未退出的识别调用，跨会话占用端口
  private held: Map<string, Promise<void>> = new Map();
  private log: TaggedLogger;

  constructor(opts: { adapters: EngineAdapters; settings: EngineSettingsV1; logs?: EngineLog }) {
    this.adapters = opts.adapters;
    this.settings = opts.settings;
    this.logs = opts.logs ?? new EngineLog();
    this.log = this.logs.tagged('Engine');
    this.registry = new DeviceRegistry({ log: this.logs.tagged('Registry') });
    this.query = new DeviceQueryService(this.registry);
  }

  public getSettings(): EngineSettingsV1 {
    return this.settings;
  }

  // 新配置在下一次 start 时生效
  public setSettings(next: EngineSettingsV1): void {
    this.settings = next;
  }

  public isRunning(): boolean {
    return this.session !== null;
  }

  public async start(): Promise<EngineState> {
    if (this.stopping) await this.stopping;
    if (this.session) return this.state();

    const s = this.settings;
    const pool = new IdentifyPool({
      registry: this.registry,
      identifier: this.adapters.createIdentifier(s),
      settings: {
        concurrency: s.concurrency,
        attemptTimeoutMs: s.attemptTimeoutMs,
        maxAttempts: s.maxAttempts,
        backoff: s.backoff
      },
      log: this.logs.tagged('Pool'),
      held: this.held
    });
    const scheduler = new ScanScheduler({
      lister: this.adapters.createLister(s),
      registry: this.registry,
      pool,
      intervalMs: s.pollIntervalMs,
      log: this.logs.tagged('Scan')
    });
    const session: RunSession = { scheduler, pool, startedAt: Date.now() };
    this.session = session;
    this.log(
      'info',
      `monitoring started poll=${s.pollIntervalMs}ms concurrency=${s.concurrency} timeout=${s.attemptTimeoutMs}ms maxAttempts=${s.maxAttempts}`
    );

    // 启动时立即扫描一次，之后按周期扫描
    await this.tickSession(session);
    if (this.session === session && !this.stopping) scheduler.start();
    this.emitState();
    return this.state();
  }

  public stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    const session = this.session;
    if (!session) return Promise.resolve();

    this.stopping = this.shutdownSession(session).finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  /**
   * 手动执行一次扫描（测试与调试用）；未启动时返回 null
   */
  public async tick(): Promise<TickReport | null> {
    const session = this.session;
    if (!session) return null;
    return this.tickSession(session);
  }

  /**
   * 等待当前会话里所有识别（含重试）结束
   */
  public async whenIdle(): Promise<void> {
    if (this.session) await this.session.pool.whenIdle();
  }

  /**
   * 显式重置：已成功或重试耗尽的端口开启新一轮识别，旧 MAC 记入 previousMac
   */
  public reset(portId: string): Readonly<DeviceRecord> {
    const session = this.session;
    const current = this.registry.get(portId);
    if (!current) throw new NotFoundError(`port ${portId} not found`);
    if (!session) throw new InvalidActionError('monitoring is not running');

    const res = this.registry.apply({ kind: 'reset', portId, at: Date.now() });
    if (!res.applied) throw new InvalidActionError(`cannot reset ${portId}: ${res.reason}`);
    const started = this.registry.apply({ kind: 'dispatch', portId, at: Date.now() });
    if (!started.applied) throw new InvalidActionError(`cannot dispatch ${portId}: ${started.reason}`);
    session.pool.submit(portId, started.record.cycle);
    this.log('info', `${portId} reset by user (cycle ${started.record.cycle})`);
    return started.record;
  }

  // 仅对重试耗尽的失败记录重新识别
  public retry(portId: string): Readonly<DeviceRecord> {
    const current = this.registry.get(portId);
    if (!current) throw new NotFoundError(`port ${portId} not found`);
    if (current.status !== 'failed' || isRetryScheduled(current)) {
      throw new InvalidActionError(`port ${portId} has no exhausted failure to retry (${current.status})`);
    }
    return this.reset(portId);
  }

  public state(): EngineState {
    const counts: Record<DeviceStatus, number> = { pending: 0, reading: 0, success: 0, failed: 0, removed: 0 };
    for (const r of this.registry.list()) counts[r.status] += 1;
    return {
      running: this.session !== null,
      startedAt: this.session?.startedAt,
      stoppedAt: this.session ? undefined : this.stoppedAt,
      lastTick: this.session ? this.session.scheduler.getLastReport() : this.lastTick,
      pool: this.session ? this.session.pool.stats() : null,
      counts
    };
  }

  public onState(cb: EngineStateListener): () => void {
    this.stateListeners.add(cb);
    return () => {
      this.stateListeners.delete(cb);
    };
  }

  // --- 内部 ---

  private tickSession(session: RunSession): Promise<TickReport> {
    return session.scheduler.tick();
  }

  private async shutdownSession(session: RunSession): Promise<void> {
    this.log('info', 'stopping monitoring...');
    await session.scheduler.stop();
    await session.pool.shutdown(this.settings.shutdownGraceMs);
    this.lastTick = session.scheduler.getLastReport();

    // 未完成的识别不会再有结果，标记为 removed，下次启动时重新识别
    for (const r of this.registry.list()) {
      if (r.status === 'pending' || r.status === 'reading' || isRetryScheduled(r)) {
        this.registry.apply({ kind: 'remove', portId: r.portId, cause: 'shutdown', at: Date.now() });
      }
    }

    if (this.session === session) this.session = null;
    this.stoppedAt = Date.now();
    this.log('info', 'monitoring stopped');
    this.emitState();
  }

  private emitState(): void {
    const snap = this.state();
    for (const cb of this.stateListeners) {
      try {
        cb(snap);
      } catch (e) {
        this.log('warn', `state listener failed: ${errorMessage(e)}`);
      }
    }
  }
}
