import { spawn } from 'child_process';
import type { DeviceIdentifier, IdentifyOptions } from '../types/capabilities';
import type { IdentifierConfig } from '../types/settings';
import { CancelledError, IdentifyError } from '../core/errors';

const MAC_LINE = /^\s*MAC:\s*([0-9a-fA-F]{2}(?:[:-][0-9a-fA-F]{2}){5,7})\s*$/m;

// 输出过长时只保留末尾部分用于诊断
const MAX_CAPTURE = 64 * 1024;

export function parseMacOutput(output: string): string | null {
  const m = MAC_LINE.exec(output);
  return m ? m[1] : null;
}

export function classifyFailure(output: string, exitCode: number | null): IdentifyError {
  const text = output.trim();
  const lastLine = text.split(/\r?\n/).filter(Boolean).pop() || `exit code ${exitCode}`;

  if (/permission denied|access is denied|PermissionError|EACCES/i.test(text)) {
    return new IdentifyError('ACCESS_DENIED', lastLine);
  }
  if (/could not open port|no such file or directory|device disconnected|device not configured|FileNotFoundError|device reports readiness to read but returned no data/i.test(text)) {
    return new IdentifyError('DISCONNECTED', lastLine);
  }
  if (/timed out|timeout/i.test(text)) {
    return new IdentifyError('TIMEOUT', lastLine);
  }
  return new IdentifyError('PROTOCOL_ERROR', lastLine);
}

/**
 * 通过 esptool 读取 ESP 系列芯片的 MAC
 * 调用形式：<command> [...args] --port <port> --baud <baud> read_mac
 * 握手细节全部交给 esptool，这里只负责进程生命周期与输出解析
 */
export class EsptoolIdentifier implements DeviceIdentifier {
  private config: IdentifierConfig;

  constructor(config: IdentifierConfig) {
    this.config = config;
  }

  public buildArgs(portId: string): string[] {
    return [...this.config.args, '--port', portId, '--baud', String(this.config.baudRate), 'read_mac'];
  }

  identify(portId: string, opts: IdentifyOptions): Promise<string> {
    const { signal } = opts;
    if (signal.aborted) return Promise.reject(new CancelledError());

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.config.command, this.buildArgs(portId), {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      let output = '';
      let settled = false;
      let abortReason: Error | null = null;
      const append = (chunk: Buffer) => {
        output += chunk.toString('utf8');
        if (output.length > MAX_CAPTURE) output = output.slice(output.length - MAX_CAPTURE);
      };

      const finish = (err: Error | null, mac?: string) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (err) reject(err);
        else resolve(mac ?? '');
      };

      // 中止后仍等子进程退出（close）再结束，端口在此之前不算释放
      const onAbort = () => {
        abortReason = signal.reason instanceof Error ? signal.reason : new CancelledError();
        if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', append);
      child.stderr.on('data', append);

      child.on('error', (err) => {
        if (abortReason) {
          finish(abortReason);
          return;
        }
        finish(new IdentifyError('PROTOCOL_ERROR', `cannot run ${this.config.command}: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (abortReason) {
          finish(abortReason);
          return;
        }
        const mac = parseMacOutput(output);
        if (code === 0 && mac) {
          finish(null, mac);
          return;
        }
        if (code === 0) {
          finish(new IdentifyError('PROTOCOL_ERROR', 'mac not found in esptool output'));
          return;
        }
        finish(classifyFailure(output, code));
      });
    });
  }
}
