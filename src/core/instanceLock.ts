import fs from 'fs';
import path from 'path';

interface LockFileContent {
  pid: number;
  createdAt: string;
  httpPort?: number;
}

export class InstanceLockedError extends Error {
  code = 'ELOCKED' as const;
  lockedPid: number;
  lockFilePath: string;

  constructor(lockedPid: number, lockFilePath: string) {
    super(`LOCKED_BY_PID:${lockedPid}`);
    this.name = 'InstanceLockedError';
    this.lockedPid = lockedPid;
    this.lockFilePath = lockFilePath;
  }
}

export function isPidAlive(pid: unknown): boolean {
  const n = Number(pid);
  if (!Number.isFinite(n) || n <= 0) return false;
  try {
    process.kill(n, 0);
    return true;
  } catch (e) {
    // EPERM：进程存在但无权发送信号
    return !!(e && typeof e === 'object' && 'code' in e && e.code === 'EPERM');
  }
}

function readLockedPid(lockFilePath: string): number | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockFilePath, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'pid' in parsed) {
      const pid = Number(parsed.pid);
      return Number.isFinite(pid) ? pid : null;
    }
    return null;
  } catch {
    return null;
  }
}

function errnoCode(e: unknown): string {
  return e && typeof e === 'object' && 'code' in e ? String(e.code) : '';
}

/**
 * 同一数据目录只允许一个监测进程：两个进程同时对同一批串口跑 esptool 会互相打断
 * 锁文件的持有进程已退出时自动接管
 */
export function acquireInstanceLock(lockFilePath: string, meta?: { httpPort?: number }): { release: () => void } {
  fs.mkdirSync(path.dirname(lockFilePath), { recursive: true });

  const content: LockFileContent = { pid: process.pid, createdAt: new Date().toISOString(), httpPort: meta?.httpPort };
  try {
    fs.writeFileSync(lockFilePath, JSON.stringify(content, null, 2), { encoding: 'utf8', flag: 'wx' });
  } catch (e) {
    if (errnoCode(e) !== 'EEXIST') throw e;
    const lockedPid = readLockedPid(lockFilePath);
    if (lockedPid !== null && isPidAlive(lockedPid)) {
      throw new InstanceLockedError(lockedPid, lockFilePath);
    }
    fs.rmSync(lockFilePath, { force: true });
    return acquireInstanceLock(lockFilePath, meta);
  }

  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    process.removeListener('exit', release);
    fs.rmSync(lockFilePath, { force: true });
  };

  process.once('exit', release);
  return { release };
}
