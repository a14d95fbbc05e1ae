import express from 'express';
import http from 'http';
import fs from 'fs';
import cors from 'cors';
import path from 'path';
import { createApp } from './api/app';
import { createWsServer } from './api/ws';
import { acquireInstanceLock, InstanceLockedError } from './core/instanceLock';
import { ESerialBusy, errorMessage } from './core/errors';
import { DiscoveryEngine } from './core/DiscoveryEngine';
import { EngineLog } from './core/EngineLog';
import { EngineSettingsStore, applyEnvOverrides } from './storage/EngineSettingsStore';
import { createAdapters } from './adapters';

const PORT = (() => {
  const n = Number(String(process.env.PORT || '').trim());
  if (Number.isFinite(n) && n > 0) return n;
  return 9001;
})();

function readVersion(): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '..', 'package.json'), 'utf8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed) return String(parsed.version);
  } catch (e) {
    console.warn(`[Server] cannot read package version: ${errorMessage(e)}`);
  }
  return '0.0.0';
}

async function main() {
  const defaultDataDir = path.resolve(__dirname, '..', 'data');
  const dataDir = (process.env.DATA_DIR && String(process.env.DATA_DIR).trim()) || defaultDataDir;
  const lockFilePath = path.join(dataDir, 'server.lock.json');
  let lock: { release: () => void } | null = null;
  try {
    lock = acquireInstanceLock(lockFilePath, { httpPort: PORT });
  } catch (e) {
    if (e instanceof InstanceLockedError) {
      throw new ESerialBusy('Another server instance is already running', {
        lockedPid: e.lockedPid,
        lockFilePath: e.lockFilePath,
      });
    }
    throw e;
  }

  const settingsStore = new EngineSettingsStore(path.join(dataDir, 'engine.settings.json'));
  const settings = applyEnvOverrides(await settingsStore.read());
  const logs = new EngineLog();
  const engine = new DiscoveryEngine({ adapters: createAdapters(), settings, logs });

  // 初始化 Express 应用
  const app = createApp(engine, settingsStore);

  const version = readVersion();
  const mainApp = express();
  mainApp.use(cors());
  mainApp.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, pid: process.pid, port: PORT, version, monitoring: engine.isRunning() });
  });
  mainApp.use('/api', app);

  // 创建 HTTP 服务器
  const server = http.createServer(mainApp);

  // 创建 WebSocket 服务器
  const wss = createWsServer(server, engine);

  const releaseLock = () => {
    try {
      lock?.release();
    } catch (e) {
      console.warn(`[Server] lock release failed: ${errorMessage(e)}`);
    }
  };

  const stopEngine = async () => {
    try {
      await engine.stop();
    } catch (e) {
      console.error(`[Server] engine stop failed: ${errorMessage(e)}`);
    }
  };

  // 监听端口
  server.on('error', async (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`PORT_IN_USE:${PORT}`);
      await stopEngine();
      releaseLock();
      process.exit(110);
    }
    console.error(err);
    await stopEngine();
    releaseLock();
    process.exit(1);
  });

  server.listen(PORT, () => {
    console.log(`Server is running on http://localhost:${PORT}`);
    console.log(`WebSocket server is running on ws://localhost:${PORT}/ws`);
    if (process.env.AUTO_START === '1') {
      engine.start().catch(e => console.error(`[Server] auto start failed: ${errorMessage(e)}`));
    }
  });

  // 优雅退出：先停止监测，等待进行中的识别结束或超时
  let exiting = false;
  async function gracefulExit(code: number) {
    if (exiting) return;
    exiting = true;
    console.log('Stopping server...');
    await stopEngine();
    wss.close();
    releaseLock();
    server.close(() => {
      console.log('Server stopped');
      process.exit(code);
    });
  }

  process.on('SIGINT', () => {
    void gracefulExit(0);
  });
  process.on('SIGTERM', () => {
    void gracefulExit(0);
  });
}

main().catch((e) => {
  if (e instanceof ESerialBusy) {
    const pidPart = Number.isFinite(Number(e.lockedPid)) ? ` pid=${e.lockedPid}` : '';
    console.error(`ESerialBusy:${pidPart} ${e.message}`);
    process.exit(110);
  }
  console.error(e);
  process.exit(1);
});
