import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EsptoolIdentifier, classifyFailure, parseMacOutput } from '../../adapters/EsptoolIdentifier';
import { CancelledError, IdentifyError, IdentifyErrorCode } from '../../core/errors';
import { isPidAlive } from '../../core/instanceLock';
import { waitFor } from '../helpers';

const FAKE = path.resolve(__dirname, '..', 'fixtures', 'fake-esptool.js');

function fakeIdentifier(): EsptoolIdentifier {
  return new EsptoolIdentifier({ command: process.execPath, args: [FAKE], baudRate: 115200 });
}

function isIdentifyError(code: IdentifyErrorCode, message?: string) {
  return (e: unknown) => e instanceof IdentifyError && e.code === code && (message === undefined || e.message === message);
}

test('parseMacOutput finds the MAC line', () => {
  const out = 'Chip is ESP32-C3 (revision v0.4)\nMAC: 34:85:18:ab:cd:ef\nUploading stub...\n';
  assert.equal(parseMacOutput(out), '34:85:18:ab:cd:ef');
  assert.equal(parseMacOutput('BASE MAC: 34:85:18:ab:cd:ef'), null);
  assert.equal(parseMacOutput('nothing here'), null);
});

test('classifyFailure maps esptool messages to error codes', () => {
  const denied = classifyFailure(
    "A fatal error occurred: Could not open /dev/ttyUSB0, the port is busy or doesn't exist.\n(could not open port '/dev/ttyUSB0': [Errno 13] Permission denied: '/dev/ttyUSB0')\n",
    2
  );
  assert.equal(denied.code, 'ACCESS_DENIED');
  assert.equal(denied.message, "(could not open port '/dev/ttyUSB0': [Errno 13] Permission denied: '/dev/ttyUSB0')");

  assert.equal(classifyFailure("could not open port 'COM9': FileNotFoundError(2, 'The system cannot find the file specified.')", 2).code, 'DISCONNECTED');
  assert.equal(classifyFailure('Failed to connect to ESP32: Timed out waiting for packet header', 2).code, 'TIMEOUT');
  assert.equal(classifyFailure('A fatal error occurred: Invalid head of packet (0x00)', 2).code, 'PROTOCOL_ERROR');

  const empty = classifyFailure('', 1);
  assert.equal(empty.code, 'PROTOCOL_ERROR');
  assert.equal(empty.message, 'exit code 1');
});

test('buildArgs appends port, baud and the read_mac command', () => {
  const id = new EsptoolIdentifier({ command: 'python', args: ['-m', 'esptool'], baudRate: 460800 });
  assert.deepEqual(id.buildArgs('/dev/ttyUSB0'), ['-m', 'esptool', '--port', '/dev/ttyUSB0', '--baud', '460800', 'read_mac']);
});

test('identify returns the MAC printed by the tool', async () => {
  const mac = await fakeIdentifier().identify('ok-0', { timeoutMs: 5000, signal: new AbortController().signal });
  assert.equal(mac, '24:0a:c4:12:34:56');
});

test('identify classifies a failed run', async () => {
  const signal = new AbortController().signal;
  await assert.rejects(
    fakeIdentifier().identify('denied-0', { timeoutMs: 5000, signal }),
    isIdentifyError('ACCESS_DENIED', "(could not open port 'denied-0': PermissionError(13, 'Permission denied'))")
  );
  await assert.rejects(
    fakeIdentifier().identify('COM-x', { timeoutMs: 5000, signal }),
    isIdentifyError('PROTOCOL_ERROR', 'A fatal error occurred: Failed to connect to ESP32: No serial data received.')
  );
  await assert.rejects(
    fakeIdentifier().identify('nomac', { timeoutMs: 5000, signal }),
    isIdentifyError('PROTOCOL_ERROR', 'mac not found in esptool output')
  );
});

test('identify kills the tool when aborted', async () => {
  const ctrl = new AbortController();
  const pending = fakeIdentifier().identify('hang', { timeoutMs: 5000, signal: ctrl.signal });
  setTimeout(() => ctrl.abort(new CancelledError()), 100);
  await assert.rejects(pending, CancelledError);
});

test('identify settles only after the aborted tool has exited', async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'esptool-pid-'));
  const pidFile = path.join(dir, 'tool.pid');
  try {
    const ctrl = new AbortController();
    const pending = fakeIdentifier().identify(`hang:${pidFile}`, { timeoutMs: 5000, signal: ctrl.signal });
    await waitFor(() => fs.existsSync(pidFile) && fs.readFileSync(pidFile, 'utf8').length > 0, 5000, 'pid file');
    const pid = Number(fs.readFileSync(pidFile, 'utf8'));
    assert.equal(isPidAlive(pid), true);

    const reason = new IdentifyError('TIMEOUT', 'no response within 50ms');
    ctrl.abort(reason);
    let aliveAtRejection: boolean | null = null;
    await assert.rejects(
      pending.catch((e: unknown) => {
        aliveAtRejection = isPidAlive(pid);
        throw e;
      }),
      (e: unknown) => e === reason
    );
    assert.equal(aliveAtRejection, false);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test('identify reports a missing command as a protocol error', async () => {
  const id = new EsptoolIdentifier({ command: path.join(__dirname, 'no-such-esptool'), args: [], baudRate: 115200 });
  await assert.rejects(
    id.identify('COM3', { timeoutMs: 5000, signal: new AbortController().signal }),
    (e: unknown) => e instanceof IdentifyError && e.code === 'PROTOCOL_ERROR' && e.message.startsWith('cannot run ')
  );
});
