import {
  ACTIVE_STATUSES,
  DeviceChangeEvent,
  DeviceMutation,
  DeviceRecord,
  RegistrySnapshot
} from '../types/device';
import { applyMutation, reasonOf } from './deviceState';
import { errorMessage } from './errors';
import { TaggedLogger } from './EngineLog';

export type ApplyResult =
  | { applied: true; record: Readonly<DeviceRecord> }
  | { applied: false; code: 'race' | 'invalid'; reason: string };

export type DeviceChangeListener = (event: DeviceChangeEvent) => void;

/**
 * 设备登记表：所有端口记录的唯一写入者
 *
 * 记录对象一经写入即冻结，修改总是整体替换，因此快照可以直接共享引用，
 * 读取方永远看不到写了一半的记录。
 */
export class DeviceRegistry {
  private records: Map<string, Readonly<DeviceRecord>> = new Map();
  private listeners: Set<DeviceChangeListener> = new Set();
  private revision = 0;
  private log: TaggedLogger;

  constructor(opts?: { log?: TaggedLogger }) {
    this.log = opts?.log ?? (() => undefined);
  }

  public apply(m: DeviceMutation): ApplyResult {
    const current = this.records.get(m.portId);
    const result = applyMutation(current, m);

    if (!result.ok) {
      if (result.code === 'race') {
        // 迟到的 worker 结果（端口已移除或已进入新一轮），直接丢弃
        this.log('debug', `discard ${m.kind} for ${m.portId} (${reasonOf(m)}): ${result.reason}`);
      }
      return { applied: false, code: result.code, reason: result.reason };
    }

    const next = Object.freeze(result.record);
    this.records.set(m.portId, next);
    this.revision += 1;

    if (result.created) {
      this.notify({ type: 'added', record: next, revision: this.revision });
    } else if (!current || current.status !== next.status) {
      this.notify({ type: 'status', record: next, previousStatus: current?.status, revision: this.revision });
    }
    return { applied: true, record: next };
  }

  public get(portId: string): Readonly<DeviceRecord> | undefined {
    return this.records.get(portId);
  }

  public has(portId: string): boolean {
    return this.records.has(portId);
  }

  public list(): Readonly<DeviceRecord>[] {
    return Array.from(this.records.values());
  }

  public activePortIds(): string[] {
    const out: string[] = [];
    for (const r of this.records.values()) {
      if (ACTIVE_STATUSES.includes(r.status)) out.push(r.portId);
    }
    return out;
  }

  public getRevision(): number {
    return this.revision;
  }

  public snapshot(): RegistrySnapshot {
    return Object.freeze({
      takenAt: Date.now(),
      revision: this.revision,
      records: Object.freeze(this.list())
    });
  }

  public subscribe(listener: DeviceChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(event: DeviceChangeEvent): void {
    for (const cb of this.listeners) {
      try {
        cb(event);
      } catch (e) {
        this.log('warn', `change listener failed: ${errorMessage(e)}`);
      }
    }
  }
}
