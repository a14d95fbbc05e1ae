import { SerialPort } from 'serialport';
import type { PortInfo } from '../types/serial';
import type { PortFilterConfig } from '../types/settings';
import type { PortLister } from '../types/capabilities';
import { EnumerationError } from '../core/errors';

export type ListPortsFn = () => Promise<PortInfo[]>;

export async function defaultListPorts(): Promise<PortInfo[]> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
    serialNumber: p.serialNumber,
    pnpId: p.pnpId,
    locationId: p.locationId,
    productId: p.productId,
    vendorId: p.vendorId
  }));
}

function normalizeHex(v?: string): string {
  return String(v || '').replace(/^0x/i, '').toUpperCase();
}

/**
 * 过滤规则：
 * 1. 去掉主板自带的标准 COM 口（ACPI\PNP0501），它们不会是开发板
 * 2. 启用 portFilter 时按 VID / PID / 路径正则筛选，空字段不参与比较
 */
export function filterPorts(ports: PortInfo[], filter: PortFilterConfig): PortInfo[] {
  const pathRe = filter.enabled && filter.pathPattern ? new RegExp(filter.pathPattern) : null;
  return ports.filter(p => {
    if (!p.path) return false;
    if (p.pnpId && p.pnpId.includes('ACPI') && p.pnpId.includes('PNP0501')) return false;
    if (!filter.enabled) return true;
    if (filter.vendorId && normalizeHex(p.vendorId) !== normalizeHex(filter.vendorId)) return false;
    if (filter.productId && normalizeHex(p.productId) !== normalizeHex(filter.productId)) return false;
    if (pathRe && !pathRe.test(p.path)) return false;
    return true;
  });
}

export class SerialPortLister implements PortLister {
  private filter: PortFilterConfig;
  private listFn: ListPortsFn;

  constructor(filter: PortFilterConfig, listFn?: ListPortsFn) {
    this.filter = filter;
    this.listFn = listFn ?? defaultListPorts;
  }

  async listPorts(): Promise<string[]> {
    let ports: PortInfo[];
    try {
      ports = await this.listFn();
    } catch (e) {
      throw new EnumerationError(`serial port enumeration failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
    return filterPorts(ports, this.filter).map(p => p.path);
  }
}
