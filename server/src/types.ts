export interface AccessCredential {
  username: string;
  accessCode: string;
}

export interface Frame {
  /** 16-byte header exactly as the printer sent it. */
  header: Buffer;
  payload: Buffer;
  size: number;
  /** Header and payload, built once and shared read-only with every client. */
  wire: Buffer;
}

export type UpstreamState =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'streaming'
  | 'backoff';

export type CameraProtocol = 'chamber_image' | 'rtsp' | 'unknown';

export interface ClientInfo {
  remoteAddress: string;
}

export interface ClientStats extends ClientInfo {
  id: string;
  connectedAt: number;
  framesDelivered: number;
  framesDropped: number;
  queued: number;
}

export interface HubStats {
  clients: number;
  framesPublished: number;
  framesDropped: number;
}

export interface UpstreamStatus {
  state: UpstreamState;
  since: number;
  attempt: number;
  lastError?: string;
}

/** Anything the proxy runs after detection. */
export interface ProxyRunner {
  readonly mode: Exclude<CameraProtocol, 'unknown'>;
  start(): Promise<void>;
  stop(): Promise<void>;
  status(): Record<string, unknown>;
}
