export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time stamp used in output file names, e.g. 20240105_090703. */
export function fileTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}
