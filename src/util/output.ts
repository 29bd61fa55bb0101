/**
 * Human-facing output. Results go to stdout; diagnostics go to stderr and are
 * filtered by the verbosity level (0 = none, 1 = errors, 2 = notices, 3 = debug, 4 = report).
 */
export type Verbosity = 0 | 1 | 2 | 3 | 4;

export const DEFAULT_VERBOSITY: Verbosity = 2;

let verbosity: Verbosity = DEFAULT_VERBOSITY;

export function setOutputConfig(config: { verbosity: Verbosity }): void {
  verbosity = config.verbosity;
}

export function resetOutputConfig(): void {
  setOutputConfig({ verbosity: DEFAULT_VERBOSITY });
}

export function toVerbosity(value: number): Verbosity {
  if (value <= 0) {
    return 0;
  }
  if (value >= 4) {
    return 4;
  }
  return value === 1 ? 1 : value === 2 ? 2 : 3;
}

/** One result line on stdout. */
export function writeResult(line: string): void {
  process.stdout.write(line.endsWith('\n') ? line : `${line}\n`);
}

/** Pre-formatted stdout text (printf templates carry their own newlines). */
export function writeRaw(text: string): void {
  if (text.length > 0) {
    process.stdout.write(text);
  }
}

export function logError(message: string): void {
  writeDiagnostic(1, message);
}

export function logNotice(message: string): void {
  writeDiagnostic(2, message);
}

export function logDebug(message: string): void {
  writeDiagnostic(3, `dbg: ${message}`);
}

export function logReport(message: string): void {
  writeDiagnostic(4, `rep: ${message}`);
}

/** 12345 => "3h25m45s" */
export function formatSeconds(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds <= 0) {
    return '0s';
  }

  const whole = Math.trunc(totalSeconds);
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;

  let text = '';
  if (hours > 0) {
    text += `${hours}h`;
  }
  if (minutes > 0) {
    text += `${minutes}m`;
  }
  if (seconds > 0) {
    text += `${seconds}s`;
  }
  return text || '0s';
}

function writeDiagnostic(level: Verbosity, message: string): void {
  if (verbosity < level) {
    return;
  }

  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}
