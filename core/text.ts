export function formatShort(text: string, maxLength = 300): string {
  const compact = text.replace(/\s+/g, ' ').trim();
  return compact.length <= maxLength ? compact : `${compact.slice(0, maxLength)}...`;
}

/** Cuts `text` to `maxLength` characters, the last three being `...`. */
export function truncateCell(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength <= 3) {
    return text.slice(0, Math.max(0, maxLength));
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDDHHmmss`. */
export function formatIdStamp(date: Date): string {
  return [
    String(date.getFullYear()),
    pad2(date.getMonth() + 1),
    pad2(date.getDate()),
    pad2(date.getHours()),
    pad2(date.getMinutes()),
    pad2(date.getSeconds()),
  ].join('');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatDateTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}
