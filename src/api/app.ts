import express, { Response } from 'express';
import cors from 'cors';
import { DiscoveryEngine } from '../core/DiscoveryEngine';
import { InvalidActionError, NotFoundError, errorMessage } from '../core/errors';
import type { LogLevel } from '../core/EngineLog';
import { formatTimestamp, parseStatuses } from '../services/DeviceQueryService';
import { toCsv } from '../services/export/csv';
import { EngineSettingsStore, applyEnvOverrides } from '../storage/EngineSettingsStore';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function sendError(res: Response, error: unknown) {
  const msg = errorMessage(error);
  if (error instanceof NotFoundError) return res.status(404).json({ code: 404, msg });
  if (error instanceof InvalidActionError) return res.status(409).json({ code: 409, msg });
  return res.status(500).json({ code: 500, msg: msg || 'internal error' });
}

function readPortId(body: unknown): string {
  if (!body || typeof body !== 'object' || !('portId' in body)) return '';
  return String(body.portId ?? '').trim();
}

export function createApp(engine: DiscoveryEngine, settingsStore?: EngineSettingsStore) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // 1. 监测状态 / 启停
  app.get('/monitor', (_req, res) => {
    res.json({ code: 0, msg: 'success', data: engine.state() });
  });

  app.post('/monitor/start', async (_req, res) => {
    try {
      const state = await engine.start();
      res.json({ code: 0, msg: 'success', data: state });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/monitor/stop', async (_req, res) => {
    try {
      await engine.stop();
      res.json({ code: 0, msg: 'success', data: engine.state() });
    } catch (error) {
      sendError(res, error);
    }
  });

  // 2. 设备记录查询：?status=success,failed&q=ttyUSB
  app.get('/devices', (req, res) => {
    const statuses = parseStatuses(req.query.status);
    const text = String(req.query.q || '').trim();
    res.json({ code: 0, msg: 'success', data: engine.query.query({ statuses, text }) });
  });

  // 端口名可能包含 "/"，用查询参数传递
  app.get('/devices/record', (req, res) => {
    const portId = String(req.query.portId || '').trim();
    if (!portId) return res.status(400).json({ code: 400, msg: 'Missing portId' });
    const record = engine.query.get(portId);
    if (!record) return res.status(404).json({ code: 404, msg: `port ${portId} not found` });
    res.json({ code: 0, msg: 'success', data: record });
  });

  // 3. 手动重新识别
  app.post('/devices/reset', (req, res) => {
    const portId = readPortId(req.body);
    if (!portId) return res.status(400).json({ code: 400, msg: 'Missing portId' });
    try {
      res.json({ code: 0, msg: 'success', data: engine.reset(portId) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post('/devices/retry', (req, res) => {
    const portId = readPortId(req.body);
    if (!portId) return res.status(400).json({ code: 400, msg: 'Missing portId' });
    try {
      res.json({ code: 0, msg: 'success', data: engine.retry(portId) });
    } catch (error) {
      sendError(res, error);
    }
  });

  // 4. 导出：默认 JSON，format=csv 时以附件形式返回
  app.get('/export', (req, res) => {
    const statuses = parseStatuses(req.query.status);
    const text = String(req.query.q || '').trim();
    const snapshot = engine.query.exportSnapshot({ statuses, text });
    if (String(req.query.format || '').toLowerCase() === 'csv') {
      const stamp = formatTimestamp(snapshot.takenAt).replace(/[-: ]/g, '');
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="devices-${stamp}.csv"`);
      return res.send(toCsv(snapshot));
    }
    res.json({ code: 0, msg: 'success', data: snapshot });
  });

  // 5. 配置：保存后在下一次启动监测时生效
  app.get('/settings', (_req, res) => {
    res.json({ code: 0, msg: 'success', data: engine.getSettings() });
  });

  app.put('/settings', async (req, res) => {
    if (!settingsStore) return res.status(404).json({ code: 404, msg: 'Settings store not enabled' });
    const next: unknown = req.body;
    if (!next || typeof next !== 'object') return res.status(400).json({ code: 400, msg: 'Invalid settings' });
    try {
      const saved = await settingsStore.write(next);
      engine.setSettings(applyEnvOverrides(saved));
      res.json({ code: 0, msg: 'success', data: { settings: engine.getSettings(), appliesOnRestart: engine.isRunning() } });
    } catch (error) {
      sendError(res, error);
    }
  });

  // 6. 引擎日志
  app.get('/logs', (req, res) => {
    const limit = Math.max(1, Math.min(Number(req.query.limit || 200), 2000));
    const levelRaw = String(req.query.level || '').trim();
    const level = LOG_LEVELS.find(l => l === levelRaw);
    res.json({ code: 0, msg: 'success', data: engine.logs.getRecent(limit, level) });
  });

  return app;
}
