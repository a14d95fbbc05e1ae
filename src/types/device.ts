// 设备记录相关的类型定义

export type DeviceStatus = 'pending' | 'reading' | 'success' | 'failed' | 'removed';

export const DEVICE_STATUSES: readonly DeviceStatus[] = ['pending', 'reading', 'success', 'failed', 'removed'];

// 仍在监测范围内的状态（removed 之外的全部）
export const ACTIVE_STATUSES: readonly DeviceStatus[] = ['pending', 'reading', 'success', 'failed'];

export type RemovalCause = 'unplugged' | 'shutdown';

export interface DeviceRecord {
  portId: string;
  status: DeviceStatus;
  mac?: string;
  previousMac?: string;
  firstSeen: number;
  lastAttempt?: number;
  attemptCount: number;
  lastError?: string;
  nextAttemptAt?: number;
  cycle: number;
  removalCause?: RemovalCause;
  updatedAt: number;
}

export type MutationReason = 'scheduler-dispatch' | 'worker-result' | 'scheduler-removal' | 'user-action';

// 所有对 DeviceRecord 的修改都通过以下 mutation 表达，由 Registry 串行应用
export type DeviceMutation =
  | { kind: 'appear'; portId: string; at: number }
  | { kind: 'dispatch'; portId: string; at: number }
  | { kind: 'attempt'; portId: string; cycle: number; at: number }
  | { kind: 'succeed'; portId: string; cycle: number; mac: string; at: number }
  | { kind: 'fail'; portId: string; cycle: number; error: string; retryAt?: number; at: number }
  | { kind: 'remove'; portId: string; cause: RemovalCause; at: number }
  | { kind: 'reset'; portId: string; at: number };

export interface DeviceChangeEvent {
  type: 'added' | 'status';
  record: Readonly<DeviceRecord>;
  previousStatus?: DeviceStatus;
  revision: number;
}

export interface RegistrySnapshot {
  takenAt: number;
  revision: number;
  records: ReadonlyArray<Readonly<DeviceRecord>>;
}
