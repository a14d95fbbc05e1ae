import { WebSocketServer, WebSocket } from 'ws';
import { Server } from 'http';
import { DiscoveryEngine } from '../core/DiscoveryEngine';
import { errorMessage } from '../core/errors';

interface WsMessage {
  type: string;
  [key: string]: unknown;
}

function parseMessage(raw: string): WsMessage | null {
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || !('type' in parsed) || typeof parsed.type !== 'string') return null;
  return { ...parsed, type: parsed.type };
}

export function createWsServer(server: Server, engine: DiscoveryEngine) {
  const wss = new WebSocketServer({ server, path: '/ws' });
  const log = engine.logs.tagged('WS');

  // 广播函数
  const broadcast = (data: unknown) => {
    const msg = JSON.stringify(data);
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    });
  };

  // 登记表变更逐条推送，前端增量渲染
  const unsubDevices = engine.query.subscribe((event) => {
    broadcast({
      type: event.type === 'added' ? 'device:added' : 'device:status',
      revision: event.revision,
      previousStatus: event.previousStatus,
      data: event.record
    });
  });

  const unsubState = engine.onState((state) => {
    broadcast({ type: 'monitor:state', data: state });
  });

  const sendSnapshot = (ws: WebSocket) => {
    const snap = engine.registry.snapshot();
    ws.send(JSON.stringify({ type: 'devices:snapshot', revision: snap.revision, data: engine.query.query() }));
    ws.send(JSON.stringify({ type: 'monitor:state', data: engine.state() }));
  };

  wss.on('connection', (ws) => {
    log('debug', 'client connected');
    sendSnapshot(ws);

    ws.on('message', (message) => {
      let parsed: WsMessage | null = null;
      try {
        parsed = parseMessage(message.toString());
      } catch (e) {
        log('warn', `invalid message: ${errorMessage(e)}`);
        return;
      }
      if (!parsed) return;

      // 处理客户端指令
      if (parsed.type === 'devices:refresh') {
        sendSnapshot(ws);
      } else if (parsed.type === 'monitor:start') {
        engine.start().catch(err => log('error', `start failed: ${errorMessage(err)}`));
      } else if (parsed.type === 'monitor:stop') {
        engine.stop().catch(err => log('error', `stop failed: ${errorMessage(err)}`));
      }
    });

    // 非法帧等协议错误只影响该连接
    ws.on('error', (err) => {
      log('warn', `client error: ${errorMessage(err)}`);
    });

    ws.on('close', () => {
      log('debug', 'client disconnected');
    });
  });

  wss.on('close', () => {
    unsubDevices();
    unsubState();
  });

  return wss;
}
