function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `DD/MM/YYYY HH:MM:SS AM/PM`, local time, 12-hour clock. */
export function formatLogTimestamp(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? 'AM' : 'PM';
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(hour12)}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ${meridiem}`
  );
}

/** `HH:MM:SS`, local time, 24-hour clock. Used for e-mail content lines. */
export function formatClockTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `YYYY-MM-DD_HH-MM-SS-mmm`, safe for file names. */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}-` +
    String(date.getMilliseconds()).padStart(3, '0')
  );
}
