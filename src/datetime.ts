const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYY-MM-DD HH:mm` (or `HH:mm:ss` with seconds). */
export function formatDateTime(date: Date, withSeconds = false): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
    return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}

/** Filename-safe local timestamp, `YYYYMMDD-HHmmss`. */
export function formatStamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
