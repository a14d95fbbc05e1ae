import { DeviceIdentifier } from '../types/capabilities';
import { formatMac } from '../adapters/mac';
import { DeviceRegistry } from './DeviceRegistry';
import { BackoffPolicy, backoffDelay } from './backoff';
import { CancelledError, IdentifyError, errorMessage, toIdentifyError } from './errors';
import { TaggedLogger } from './EngineLog';

export interface PoolSettings {
  concurrency: number;
  attemptTimeoutMs: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
}

export interface PoolStats {
  running: number;
  queued: number;
  retryQueued: number;
  waitingRetry: number;
  accepting: boolean;
}

interface IdentifyJob {
  portId: string;
  cycle: number;
  retry: boolean;
}

interface RunningJob {
  job: IdentifyJob;
  controller: AbortController;
  cancelled: boolean;
  done: Promise<void>;
  // 识别调用本身结束（超时或取消后仍可能在跑），结束前端口不释放
  released: Promise<void>;
}

/**
 * 识别作业池
 *
 * - 同时最多 concurrency 个识别在跑
 * - 同一端口任何时刻最多一个作业持有（被取消但尚未退出的作业也算持有）
 * - 新端口优先于重试作业获得空闲槽位，各自 FIFO
 * - 取消幂等；被取消的作业不写入任何结果
 * - held 中的端口仍被上一个池放弃的识别占用，调用结束前不派发
 */
export class IdentifyPool {
  private registry: DeviceRegistry;
  private identifier: DeviceIdentifier;
  private settings: PoolSettings;
  private log: TaggedLogger;

  private freshQueue: IdentifyJob[] = [];
  private retryQueue: IdentifyJob[] = [];
  private running: Map<string, RunningJob> = new Map();
  private retryTimers: Map<string, NodeJS.Timeout> = new Map();
  private idleWaiters: Array<() => void> = [];
  private accepting = true;
  private held: Map<string, Promise<void>>;

  constructor(opts: {
    registry: DeviceRegistry;
    identifier: DeviceIdentifier;
    settings: PoolSettings;
    log?: TaggedLogger;
    held?: Map<string, Promise<void>>;
  }) {
    this.registry = opts.registry;
    this.identifier = opts.identifier;
    this.settings = {
      ...opts.settings,
      concurrency: Math.max(1, Math.floor(opts.settings.concurrency)),
      maxAttempts: Math.max(1, Math.floor(opts.settings.maxAttempts))
    };
    this.log = opts.log ?? (() => undefined);
    this.held = opts.held ?? new Map();
    for (const [portId, released] of this.held) this.watchHeld(portId, released);
  }

  /**
   * 提交新端口的首次识别；调用方需先把记录推进到 reading
   */
  public submit(portId: string, cycle: number): boolean {
    if (!this.accepting) return false;
    this.freshQueue.push({ portId, cycle, retry: false });
    this.pump();
    return true;
  }

  public cancel(portId: string): void {
    this.freshQueue = this.freshQueue.filter(j => j.portId !== portId);
    this.retryQueue = this.retryQueue.filter(j => j.portId !== portId);

    const timer = this.retryTimers.get(portId);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(portId);
    }

    const run = this.running.get(portId);
    if (run && !run.cancelled) {
      run.cancelled = true;
      run.controller.abort(new CancelledError());
      this.log('info', `cancel running identification on ${portId}`);
    }
    this.checkIdle();
  }

  public isBusy(portId: string): boolean {
    return (
      this.running.has(portId) ||
      this.retryTimers.has(portId) ||
      this.freshQueue.some(j => j.portId === portId) ||
      this.retryQueue.some(j => j.portId === portId)
    );
  }

  public stats(): PoolStats {
    return {
      running: this.running.size,
      queued: this.freshQueue.length,
      retryQueued: this.retryQueue.length,
      waitingRetry: this.retryTimers.size,
      accepting: this.accepting
    };
  }

  public whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  /**
   * 停止接收新作业并取消全部作业；最多等待 graceMs 让正在运行的识别退出
   * 之后放弃等待，迟到的结果会被丢弃
   */
  public async shutdown(graceMs: number): Promise<void> {
    this.accepting = false;
    const ports = new Set<string>([
      ...this.freshQueue.map(j => j.portId),
      ...this.retryQueue.map(j => j.portId),
      ...this.retryTimers.keys(),
      ...this.running.keys()
    ]);
    for (const p of ports) this.cancel(p);

    const pending = Array.from(this.running.values()).map(r => r.done);
    if (pending.length === 0) return;

    let settled = false;
    let graceElapsed: () => void = () => undefined;
    const grace = new Promise<void>(r => {
      graceElapsed = r;
    });
    const graceTimer = setTimeout(() => graceElapsed(), Math.max(0, graceMs));
    await Promise.race([
      Promise.allSettled(pending).then(() => {
        settled = true;
      }),
      grace
    ]);
    clearTimeout(graceTimer);
    if (!settled) {
      this.log('warn', `abandon ${this.running.size} identification(s) after ${graceMs}ms grace period`);
      // 放弃等待但端口仍被占用，交给共享 held 的下一个池
      for (const [portId, run] of this.running) {
        this.held.set(portId, run.released);
        this.watchHeld(portId, run.released);
      }
      this.running.clear();
      this.checkIdle();
    }
  }

  // --- 内部 ---

  private isIdle(): boolean {
    return (
      this.running.size === 0 &&
      this.freshQueue.length === 0 &&
      this.retryQueue.length === 0 &&
      this.retryTimers.size === 0
    );
  }

  private checkIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const w of waiters) w();
  }

  private watchHeld(portId: string, released: Promise<void>): void {
    void released.then(() => {
      if (this.held.get(portId) === released) this.held.delete(portId);
      this.pump();
    });
  }

  // 取出第一个端口未被占用的作业
  private takeFrom(queue: IdentifyJob[]): IdentifyJob | undefined {
    const idx = queue.findIndex(j => !this.running.has(j.portId) && !this.held.has(j.portId));
    if (idx < 0) return undefined;
    return queue.splice(idx, 1)[0];
  }

  private pump(): void {
    while (this.running.size < this.settings.concurrency) {
      const job = this.takeFrom(this.freshQueue) ?? this.takeFrom(this.retryQueue);
      if (!job) break;
      this.start(job);
    }
    this.checkIdle();
  }

  private start(job: IdentifyJob): void {
    const controller = new AbortController();
    const entry: RunningJob = { job, controller, cancelled: false, done: Promise.resolve(), released: Promise.resolve() };
    this.running.set(job.portId, entry);

    entry.done = this.runAttempt(entry)
      .catch(e => {
        this.log('error', `identification worker crashed on ${job.portId}: ${errorMessage(e)}`);
      })
      .then(() => entry.released)
      .finally(() => {
        if (this.running.get(job.portId) === entry) this.running.delete(job.portId);
        this.pump();
      });
  }

  private async runAttempt(entry: RunningJob): Promise<void> {
    const { portId, cycle } = entry.job;
    const begun = this.registry.apply({ kind: 'attempt', portId, cycle, at: Date.now() });
    if (!begun.applied) return;
    const attemptNo = begun.record.attemptCount;

    let mac: string | null = null;
    let failure: IdentifyError | null = null;
    try {
      const raw = await this.identifyWithTimeout(portId, entry);
      mac = formatMac(raw);
      if (!mac) failure = new IdentifyError('PROTOCOL_ERROR', `malformed mac "${raw}"`);
    } catch (e) {
      failure = toIdentifyError(e);
    }

    if (entry.cancelled) {
      this.log('debug', `drop result of cancelled identification on ${portId}`);
      return;
    }

    if (mac && !failure) {
      const res = this.registry.apply({ kind: 'succeed', portId, cycle, mac, at: Date.now() });
      if (res.applied) this.log('info', `${portId} identified mac=${mac} attempt=${attemptNo}`);
      return;
    }

    const err = failure ?? new IdentifyError('PROTOCOL_ERROR', 'empty response');
    const text = `${err.code}: ${err.message}`;

    if (attemptNo < this.settings.maxAttempts && this.accepting) {
      const delay = backoffDelay(this.settings.backoff, attemptNo);
      const retryAt = Date.now() + delay;
      const res = this.registry.apply({ kind: 'fail', portId, cycle, error: text, retryAt, at: Date.now() });
      if (!res.applied) return;
      this.log('warn', `${portId} attempt ${attemptNo}/${this.settings.maxAttempts} failed (${text}), retry in ${delay}ms`);
      this.scheduleRetry(portId, cycle, delay);
      return;
    }

    const res = this.registry.apply({ kind: 'fail', portId, cycle, error: text, at: Date.now() });
    if (res.applied) this.log('error', `${portId} identification failed after ${attemptNo} attempt(s): ${text}`);
  }

  private scheduleRetry(portId: string, cycle: number, delay: number): void {
    const timer = setTimeout(() => {
      this.retryTimers.delete(portId);
      const res = this.registry.apply({ kind: 'dispatch', portId, at: Date.now() });
      if (res.applied && res.record.cycle === cycle && this.accepting) {
        this.retryQueue.push({ portId, cycle, retry: true });
      }
      this.pump();
    }, delay);
    this.retryTimers.set(portId, timer);
  }

  private identifyWithTimeout(portId: string, entry: RunningJob): Promise<string> {
    const timeoutMs = this.settings.attemptTimeoutMs;
    const { controller } = entry;
    const signal = controller.signal;

    return new Promise<string>((resolve, reject) => {
      if (signal.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal.reason instanceof Error ? signal.reason : new CancelledError());
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        const err = new IdentifyError('TIMEOUT', `no response within ${timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });

      const call = Promise.resolve().then(() => this.identifier.identify(portId, { timeoutMs, signal }));
      entry.released = call.then(
        () => undefined,
        () => undefined
      );
      void call.then(
        mac => {
          clearTimeout(timer);
          signal.removeEventListener('abort', onAbort);
          resolve(mac);
        },
        e => {
          clearTimeout(timer);
          signal.removeEventListener('abort', onAbort);
          reject(e);
        }
      );
    });
  }
}
