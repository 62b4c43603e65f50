function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Formats a Date object to a YYYY-MM-DD string using local time components.
 */
export function formatLocalDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Formats a Date object to "YYYY-MM-DD HH:mm:ss" in local time,
 * the timestamp format of report rows.
 */
export function formatLocalDateTime(date: Date): string {
    return `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Compact local timestamp for file names, e.g. 20240115_093005
 */
export function formatFileTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}
