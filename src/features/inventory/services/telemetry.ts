// Lightweight telemetry utility with basic PII redaction
// Sinks are swappable; the default writes to the console

export type TelemetryData = Record<string, unknown>;

export interface TelemetrySink {
  captureEvent(name: string, data?: TelemetryData): void;
  captureError(name: string, error: unknown, data?: TelemetryData): void;
}

const REDACTED_KEYS = /notes|contact|customer|name|performedBy|actor/i;

function redact(value: unknown): unknown {
  if (typeof value === 'string') {
    if (!value) return value;
    // Keep first 3 chars, mask the rest
    return value.length <= 3 ? '***' : `${value.slice(0, 3)}***`;
  }
  return value;
}

export function sanitize(data?: TelemetryData): TelemetryData | undefined {
  if (!data) return undefined;
  const cloned: TelemetryData = {};
  for (const [k, v] of Object.entries(data)) {
    cloned[k] = REDACTED_KEYS.test(k) ? redact(v) : v;
  }
  return cloned;
}

export function normalizeError(err: unknown): { message: string; code?: string; stack?: string } {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, code, stack: err.stack };
  }
  if (typeof err === 'string') return { message: err };
  try {
    return { message: JSON.stringify(err) };
  } catch {
    return { message: 'Unknown error' };
  }
}

export const consoleSink: TelemetrySink = {
  captureEvent(name, data) {
    // eslint-disable-next-line no-console
    console.info('[telemetry:event]', name, sanitize(data));
  },
  captureError(name, error, data) {
    // eslint-disable-next-line no-console
    console.error('[telemetry:error]', name, sanitize(data), normalizeError(error));
  },
};

let activeSink: TelemetrySink = consoleSink;
let enabled = true;

export function configureTelemetry(options: { enabled?: boolean; sink?: TelemetrySink }): void {
  if (options.enabled !== undefined) enabled = options.enabled;
  if (options.sink) activeSink = options.sink;
}

export const telemetry = {
  event: (name: string, data?: TelemetryData) => {
    if (enabled) activeSink.captureEvent(name, data);
  },
  error: (name: string, error: unknown, data?: TelemetryData) => {
    if (enabled) activeSink.captureError(name, error, data);
  },
};
