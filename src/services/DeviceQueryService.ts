import { DeviceRegistry, DeviceChangeListener } from '../core/DeviceRegistry';
import { DEVICE_STATUSES, DeviceRecord, DeviceStatus } from '../types/device';

export interface DeviceQuery {
  statuses?: DeviceStatus[];
  text?: string;
}

export interface ExportRow {
  timestamp: string;
  portId: string;
  mac: string;
  status: string;
}

export interface ExportSnapshot {
  takenAt: number;
  revision: number;
  rows: ExportRow[];
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

// 本地时间 YYYY-MM-DD HH:mm:ss
export function formatTimestamp(ts: number): string {
  const d = new Date(ts);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function statusLabel(r: Readonly<DeviceRecord>): string {
  switch (r.status) {
    case 'success':
      return 'ok';
    case 'failed':
      return `failed: ${r.lastError || 'unknown error'}`;
    case 'pending':
    case 'reading':
    case 'removed':
      return r.status;
  }
}

// 已移除的记录保留最后确认过的 MAC，便于审计
export function exportedMac(r: Readonly<DeviceRecord>): string {
  if (r.status === 'success') return r.mac || '';
  if (r.status === 'removed') return r.previousMac || '';
  return '';
}

export function parseStatuses(raw: unknown): DeviceStatus[] | undefined {
  const text = String(raw ?? '').trim().toLowerCase();
  if (!text) return undefined;
  const out: DeviceStatus[] = [];
  for (const part of text.split(',')) {
    const s = DEVICE_STATUSES.find(v => v === part.trim());
    if (s && !out.includes(s)) out.push(s);
  }
  return out;
}

function byFirstSeen(a: Readonly<DeviceRecord>, b: Readonly<DeviceRecord>): number {
  if (a.firstSeen !== b.firstSeen) return a.firstSeen - b.firstSeen;
  return a.portId < b.portId ? -1 : a.portId > b.portId ? 1 : 0;
}

/**
 * 只读查询与导出：面向展示层和导出器
 */
export class DeviceQueryService {
  private registry: DeviceRegistry;

  constructor(registry: DeviceRegistry) {
    this.registry = registry;
  }

  public query(q: DeviceQuery = {}): Readonly<DeviceRecord>[] {
    return this.filter(this.registry.snapshot().records, q);
  }

  private filter(records: ReadonlyArray<Readonly<DeviceRecord>>, q: DeviceQuery): Readonly<DeviceRecord>[] {
    const text = String(q.text || '').trim().toLowerCase();
    const statuses = q.statuses && q.statuses.length > 0 ? new Set(q.statuses) : null;

    return records
      .filter(r => {
        if (statuses && !statuses.has(r.status)) return false;
        if (!text) return true;
        const haystack = [r.portId, r.mac || '', r.previousMac || '', statusLabel(r)].join(' ').toLowerCase();
        return haystack.includes(text);
      })
      .sort(byFirstSeen);
  }

  public get(portId: string): Readonly<DeviceRecord> | undefined {
    return this.registry.get(portId);
  }

  public subscribe(listener: DeviceChangeListener): () => void {
    return this.registry.subscribe(listener);
  }

  /**
   * 导出用的时间点快照：基于同一 revision 的冻结记录生成，期间的写入不影响结果
   */
  public exportSnapshot(q: DeviceQuery = {}): ExportSnapshot {
    const snap = this.registry.snapshot();
    const rows = this.filter(snap.records, q).map(r => ({
      timestamp: formatTimestamp(r.lastAttempt ?? r.firstSeen),
      portId: r.portId,
      mac: exportedMac(r),
      status: statusLabel(r)
    }));
    return { takenAt: snap.takenAt, revision: snap.revision, rows };
  }
}
