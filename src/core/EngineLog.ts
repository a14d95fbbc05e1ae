export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: number;
  level: LogLevel;
  tag: string;
  msg: string;
}

export type TaggedLogger = (level: LogLevel, msg: string) => void;

/**
 * 引擎日志：保留最近 N 条供 /api/logs 查询，同时回显到控制台
 * ENGINE_LOG_CONSOLE=0 关闭控制台回显，ENGINE_LOG_DEBUG=1 打开 debug 回显
 */
export class EngineLog {
  private entries: LogEntry[] = [];
  private maxEntries: number;
  private echo: boolean;
  private echoDebug: boolean;

  constructor(opts?: { maxEntries?: number; echo?: boolean }) {
    this.maxEntries = Math.max(10, Math.min(opts?.maxEntries || 500, 10000));
    this.echo = opts?.echo ?? process.env.ENGINE_LOG_CONSOLE !== '0';
    this.echoDebug = process.env.ENGINE_LOG_DEBUG === '1';
  }

  public write(level: LogLevel, tag: string, msg: string): void {
    this.entries.push({ ts: Date.now(), level, tag, msg });
    if (this.entries.length > this.maxEntries) this.entries.splice(0, this.entries.length - this.maxEntries);
    if (!this.echo) return;

    const line = `[${tag}] ${msg}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else if (level === 'info') console.log(line);
    else if (this.echoDebug) console.log(line);
  }

  public tagged(tag: string): TaggedLogger {
    return (level, msg) => this.write(level, tag, msg);
  }

  public getRecent(limit: number, level?: LogLevel): LogEntry[] {
    const list = level ? this.entries.filter(e => e.level === level) : this.entries;
    const n = Math.max(0, Math.min(limit || 100, list.length));
    return list.slice(list.length - n);
  }
}
