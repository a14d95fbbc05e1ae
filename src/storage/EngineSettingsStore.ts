import { JsonFileStore } from './JsonFileStore';
import type { EngineSettingsV1 } from '../types/settings';

type Loose = Record<string, unknown>;

function asObject(v: unknown): Loose {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return {};
  return Object.fromEntries(Object.entries(v));
}

function clampInt(v: unknown, fallback: number, min: number, max: number): number {
  const n = Number(v);
  if (v === null || v === undefined || v === '' || !Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.round(n)));
}

function normalizeHexLike(v: unknown, maxLen: number): string {
  const s = String(v ?? '').trim();
  if (!s) return '';
  return s.replace(/^0x/i, '').replace(/[^0-9a-fA-F]/g, '').toUpperCase().slice(0, maxLen);
}

function normalizePattern(v: unknown): string {
  const s = String(v ?? '').trim();
  if (!s) return '';
  try {
    new RegExp(s);
    return s;
  } catch {
    return '';
  }
}

export function getDefaultSettings(): EngineSettingsV1 {
  return {
    schemaVersion: 1,
    updatedAt: Date.now(),
    pollIntervalMs: 1000,
    concurrency: 4,
    attemptTimeoutMs: 8000,
    maxAttempts: 3,
    backoff: { baseDelayMs: 500, maxDelayMs: 5000 },
    shutdownGraceMs: 2000,
    portFilter: { enabled: false, vendorId: '', productId: '', pathPattern: '' },
    identifier: { command: 'esptool.py', args: [], baudRate: 115200 }
  };
}

export function normalizeSettings(input: unknown): EngineSettingsV1 {
  const d = getDefaultSettings();
  if (!input || typeof input !== 'object') return d;
  const o = asObject(input);
  const backoffIn = asObject(o.backoff);
  const filterIn = asObject(o.portFilter);
  const identIn = asObject(o.identifier);

  const baseDelayMs = clampInt(backoffIn.baseDelayMs, d.backoff.baseDelayMs, 0, 60_000);
  const maxDelayMs = clampInt(backoffIn.maxDelayMs, Math.max(baseDelayMs, d.backoff.maxDelayMs), baseDelayMs, 300_000);
  const command = String(identIn.command ?? '').trim() || d.identifier.command;
  const args = Array.isArray(identIn.args) ? identIn.args.map(a => String(a)).filter(Boolean) : d.identifier.args;

  return {
    schemaVersion: 1,
    updatedAt: clampInt(o.updatedAt, d.updatedAt, 0, Number.MAX_SAFE_INTEGER),
    pollIntervalMs: clampInt(o.pollIntervalMs, d.pollIntervalMs, 100, 60_000),
    concurrency: clampInt(o.concurrency, d.concurrency, 1, 32),
    attemptTimeoutMs: clampInt(o.attemptTimeoutMs, d.attemptTimeoutMs, 500, 120_000),
    maxAttempts: clampInt(o.maxAttempts, d.maxAttempts, 1, 20),
    backoff: { baseDelayMs, maxDelayMs },
    shutdownGraceMs: clampInt(o.shutdownGraceMs, d.shutdownGraceMs, 0, 30_000),
    portFilter: {
      enabled: !!filterIn.enabled,
      vendorId: normalizeHexLike(filterIn.vendorId, 4),
      productId: normalizeHexLike(filterIn.productId, 4),
      pathPattern: normalizePattern(filterIn.pathPattern)
    },
    identifier: {
      command,
      args,
      baudRate: clampInt(identIn.baudRate, d.identifier.baudRate, 9600, 3_000_000)
    }
  };
}

// 环境变量优先于文件配置
export function applyEnvOverrides(s: EngineSettingsV1, env: NodeJS.ProcessEnv = process.env): EngineSettingsV1 {
  const cmd = String(env.ESPTOOL_CMD || '').trim();
  if (!cmd) return s;
  return { ...s, identifier: { ...s.identifier, command: cmd } };
}

export class EngineSettingsStore {
  private store: JsonFileStore;

  constructor(filePath: string) {
    this.store = new JsonFileStore(filePath);
  }

  async read(): Promise<EngineSettingsV1> {
    const raw = await this.store.read();
    return normalizeSettings(raw);
  }

  async write(next: unknown): Promise<EngineSettingsV1> {
    const normalized = normalizeSettings({ ...asObject(next), updatedAt: Date.now() });
    await this.store.write(normalized);
    return normalized;
  }
}
