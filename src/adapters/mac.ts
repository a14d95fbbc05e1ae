/**
 * 把识别工具返回的各种 MAC 表示统一为小写冒号分隔格式
 * 支持：字节数组、"AABBCCDDEEFF"、"aa:bb:cc:dd:ee:ff"、"AA-BB-CC-DD-EE-FF"
 * 无法识别为 6 或 8 字节地址时返回 null
 */
export function formatMac(value: unknown): string | null {
  if (value instanceof Uint8Array || Array.isArray(value)) {
    const bytes = Array.from(value, v => Number(v));
    if (bytes.length !== 6 && bytes.length !== 8) return null;
    if (bytes.some(b => !Number.isInteger(b) || b < 0 || b > 255)) return null;
    return bytes.map(b => b.toString(16).padStart(2, '0')).join(':');
  }

  if (typeof value !== 'string') return null;
  const text = value.trim().toLowerCase();
  if (!text) return null;

  const compact = /^[0-9a-f]+$/.test(text) ? text : null;
  const separated = /^[0-9a-f]{2}([:-][0-9a-f]{2})+$/.test(text) ? text.replace(/-/g, ':') : null;

  if (compact && (compact.length === 12 || compact.length === 16)) {
    const pairs: string[] = [];
    for (let i = 0; i < compact.length; i += 2) pairs.push(compact.slice(i, i + 2));
    return pairs.join(':');
  }
  if (separated) {
    const n = separated.split(':').length;
    if (n === 6 || n === 8) return separated;
  }
  return null;
}
