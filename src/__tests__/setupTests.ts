import { afterEach, beforeAll, vi } from 'vitest';
import { configureTelemetry, consoleSink } from '@/features/inventory/services/telemetry';

// Keep test output quiet; telemetry tests switch it back on locally
beforeAll(() => configureTelemetry({ enabled: false, sink: consoleSink }));

afterEach(() => {
  configureTelemetry({ enabled: false, sink: consoleSink });
  vi.restoreAllMocks();
});
