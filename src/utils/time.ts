function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local-time `DD-MM-YYYY-HH-MM`, the suffix of every output directory name. */
export function runDirStamp(date: Date): string {
  return [
    pad(date.getDate()),
    pad(date.getMonth() + 1),
    pad(date.getFullYear(), 4),
    pad(date.getHours()),
    pad(date.getMinutes())
  ].join("-");
}

export function logTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
