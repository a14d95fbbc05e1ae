import fs from 'fs/promises';
import path from 'path';

export type JsonReadSource = 'main' | 'backup' | 'default';

function errnoCode(e: unknown): string {
  if (e && typeof e === 'object' && 'code' in e) return String(e.code);
  return '';
}

async function readJson(filePath: string): Promise<{ ok: true; value: unknown } | { ok: false; reason: string }> {
  try {
    const raw = await fs.readFile(filePath, 'utf8');
    return { ok: true, value: JSON.parse(raw) };
  } catch (e) {
    const code = errnoCode(e);
    return { ok: false, reason: code || (e instanceof Error ? e.message : String(e)) };
  }
}

/**
 * JSON 文件存储：写入前备份到 .bak，先写临时文件再 rename
 * 主文件损坏时回退到 .bak，二者都不可用时返回默认值
 */
export class JsonFileStore {
  private filePath: string;
  private lastSerialized: string | null = null;
  private lastSource: JsonReadSource = 'default';
  private lastReadError: string | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public getLastSource(): JsonReadSource {
    return this.lastSource;
  }

  // 上次读取主文件失败的原因（ENOENT 或解析错误），成功时为 null
  public getLastReadError(): string | null {
    return this.lastReadError;
  }

  public async read(): Promise<unknown> {
    const main = await readJson(this.filePath);
    if (main.ok) {
      this.lastSource = 'main';
      this.lastReadError = null;
      return main.value;
    }
    this.lastReadError = main.reason;
    if (main.reason !== 'ENOENT') {
      console.warn(`[JsonFileStore] ${this.filePath} unreadable (${main.reason}), trying backup`);
    }
    const backup = await readJson(`${this.filePath}.bak`);
    if (backup.ok) {
      this.lastSource = 'backup';
      return backup.value;
    }
    this.lastSource = 'default';
    return undefined;
  }

  public async write(value: unknown): Promise<void> {
    const serialized = JSON.stringify(value, null, 2);
    if (serialized === this.lastSerialized) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') {
        throw e;
      }
    }
    const tmpPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmpPath, serialized, 'utf8');
    await fs.rename(tmpPath, this.filePath);
    this.lastSerialized = serialized;
  }
}
