export interface ServerConfiguration {
  /** Canonical repository root, always terminated by the path separator */
  readonly repositoryRoot: string;
  readonly port: number;
  /** Absent means authentication is disabled */
  readonly securityToken?: string;
  /** Logs presented tokens and request headers verbatim. Never enable in production. */
  readonly debug: boolean;
  readonly restartTriggerFile: string;
  readonly pollIntervalMs: number;
  readonly gitTimeoutMs: number;
}

export interface WebhookRequest {
  subpath: string;
  token?: string;
}

export type SyncResult =
  | { success: true; message: string }
  | { success: false; message: string };

export interface ApiResponse {
  status: 'success' | 'error';
  message: string;
}

export interface WebhookResponse {
  statusCode: number;
  body: ApiResponse;
}

export interface RepositorySynchronizer {
  synchronize(directory: string): Promise<SyncResult>;
}

export type RestartState = 'idle' | 'restart-requested';
