import { bool, field, int, record, str, type Decoder } from '../decoding/decoders';

export interface ApiRoot {
  url: string;
  version: string;
}

export interface HealthStatus {
  is_healthy: boolean;
}

export interface HealthClock {
  /** Server time in milliseconds since the UNIX epoch */
  server_time: number;
}

export const decodeApiRoot: Decoder<ApiRoot> = (value, path) => {
  const source = record(value, path);
  return {
    url: field(source, 'url', str, path),
    version: field(source, 'version', str, path),
  };
};

export const decodeHealthStatus: Decoder<HealthStatus> = (value, path) => ({
  is_healthy: field(record(value, path), 'is_healthy', bool, path),
});

export const decodeHealthClock: Decoder<HealthClock> = (value, path) => ({
  server_time: field(record(value, path), 'server_time', int, path),
});

export const HEALTH_PATHS = {
  root: '/',
  health: '/health',
  clock: '/health/clock',
} as const;
