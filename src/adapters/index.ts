import type { EngineAdapters } from '../core/DiscoveryEngine';
import { EsptoolIdentifier } from './EsptoolIdentifier';
import { SerialPortLister } from './SerialPortLister';
import { MockIdentifier, MockPortLister, fakeMacFor } from './mock';

export function parseMockPorts(raw: string | undefined): string[] {
  return String(raw || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * MOCK_DEVICES 非空时使用内存设备（前端联调），否则使用真实串口 + esptool
 */
export function createAdapters(env: NodeJS.ProcessEnv = process.env): EngineAdapters {
  const mockPorts = parseMockPorts(env.MOCK_DEVICES);
  if (mockPorts.length > 0) {
    const lister = new MockPortLister(mockPorts);
    const identifier = new MockIdentifier(portId => ({ mac: fakeMacFor(portId), delayMs: 300 }));
    return {
      createLister: () => lister,
      createIdentifier: () => identifier
    };
  }
  return {
    createLister: settings => new SerialPortLister(settings.portFilter),
    createIdentifier: settings => new EsptoolIdentifier(settings.identifier)
  };
}
