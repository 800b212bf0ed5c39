function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local time as `dd.mm.yyyy HH:MM[:SS]`, the format used in logs and the alert log.
 */
export function formatTimestamp(date: Date, withSeconds = true): string {
  const day = `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}
