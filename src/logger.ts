const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Formats a log line as `[14/Jun/2016 06:24:50] message`, the layout used by
 * the access log of most small HTTP servers.
 */
export function formatLogLine(message: string, date = new Date()): string {
  const day = pad(date.getDate());
  const month = MONTHS[date.getMonth()] ?? "???";
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(pad)
    .join(":");
  return `[${day}/${month}/${date.getFullYear()} ${time}] ${message}`;
}

export function formatRequestLine(
  method: string | undefined,
  url: string | undefined,
  httpVersion: string,
  status: number,
): string {
  return `"${method ?? "-"} ${url ?? "-"} HTTP/${httpVersion}" ${status}`;
}

export function createConsoleLogger(): Logger {
  return {
    info(message) {
      console.error(formatLogLine(message));
    },
    warn(message) {
      console.warn(formatLogLine(`Warning: ${message}`));
    },
    error(message) {
      console.error(formatLogLine(`Error: ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
