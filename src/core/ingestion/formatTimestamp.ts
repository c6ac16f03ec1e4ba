const pad = (n: number): string => String(n).padStart(2, '0');

/** Slack `ts` ("1700000000.000001") as local `YYYY-MM-DD HH:MM:SS`. */
export function formatSlackTimestamp(ts: string): string {
  const seconds = Number.parseFloat(ts);
  if (!Number.isFinite(seconds)) {
    throw new RangeError(`Invalid Slack timestamp: ${ts}`);
  }
  const d = new Date(Math.floor(seconds) * 1000);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}
