export interface PortFilterConfig {
  enabled: boolean;
  vendorId: string;
  productId: string;
  pathPattern: string;
}

export interface IdentifierConfig {
  command: string;
  args: string[];
  baudRate: number;
}

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface EngineSettingsV1 {
  schemaVersion: 1;
  updatedAt: number;
  pollIntervalMs: number;
  concurrency: number;
  attemptTimeoutMs: number;
  maxAttempts: number;
  backoff: BackoffConfig;
  shutdownGraceMs: number;
  portFilter: PortFilterConfig;
  identifier: IdentifierConfig;
}
