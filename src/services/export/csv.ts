import type { ExportSnapshot } from '../DeviceQueryService';

const HEADER = ['time', 'port', 'mac', 'status'];

function escapeCell(v: string): string {
  if (/[",\r\n]/.test(v)) return `"${v.replace(/"/g, '""')}"`;
  return v;
}

export function toCsv(snapshot: ExportSnapshot): string {
  const lines = [HEADER.join(',')];
  for (const row of snapshot.rows) {
    lines.push([row.timestamp, row.portId, row.mac, row.status].map(escapeCell).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}
