export class ESerialBusy extends Error {
  code = 'ESerialBusy' as const;
  lockedPid?: number;
  lockFilePath?: string;

  constructor(message: string, options?: { lockedPid?: number; lockFilePath?: string }) {
    super(message);
    this.name = 'ESerialBusy';
    this.lockedPid = options?.lockedPid;
    this.lockFilePath = options?.lockFilePath;
  }
}

// 串口枚举失败：瞬时错误，下一次 tick 重试，不改变任何记录
export class EnumerationError extends Error {
  code = 'EENUM' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnumerationError';
  }
}

export type IdentifyErrorCode = 'TIMEOUT' | 'ACCESS_DENIED' | 'PROTOCOL_ERROR' | 'DISCONNECTED';

export class IdentifyError extends Error {
  code: IdentifyErrorCode;

  constructor(code: IdentifyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IdentifyError';
    this.code = code;
  }
}

// 作业被取消（端口移除 / 引擎停止），结果直接丢弃
export class CancelledError extends Error {
  code = 'ECANCELLED' as const;

  constructor(message = 'identification cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class InvalidActionError extends Error {
  code = 'EINVALID' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidActionError';
  }
}

export class NotFoundError extends Error {
  code = 'ENOTFOUND' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// 非 IdentifyError 的异常统一按协议错误处理
export function toIdentifyError(e: unknown): IdentifyError {
  if (e instanceof IdentifyError) return e;
  return new IdentifyError('PROTOCOL_ERROR', errorMessage(e) || 'unknown error', { cause: e });
}
