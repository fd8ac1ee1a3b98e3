import type { SecureContext } from 'tls';

export enum RemoteState {
  UNLOADED = 'unloaded',
  BACKEND_LOADED = 'backend_loaded',
  TUNNEL_ACTIVE = 'tunnel_active',
  TOKEN_PENDING = 'token_pending'
}

export interface BackendResponse {
  status: number;
  body: unknown;
}

export interface InstanceRegistration {
  domain: string;
  email: string;
  server: string;
}

export interface SessionToken {
  token: string;
}

/**
 * Remote control-plane calls used by the lifecycle manager.
 * Implementations report HTTP failures through `status` and only reject
 * when no answer was received at all.
 */
export interface BackendClient {
  registerInstance(): Promise<BackendResponse>;
  requestSessionToken(key: Buffer, iv: Buffer): Promise<BackendResponse>;
}

/** Publishes the DNS-01 TXT value for the instance domain. */
export interface ChallengeBackend {
  setChallengeTxt(txt: string): Promise<BackendResponse>;
}

export interface CertificateHandler {
  readonly domain: string;
  readonly email: string;
  /** Only meaningful once `isValidCertificate()` resolved to true. */
  readonly pathFullchain: string;
  readonly pathPrivateKey: string;
  isValidCertificate(): Promise<boolean>;
  issueCertificate(): Promise<void>;
}

export interface TunnelClientOptions {
  context: SecureContext;
  server: string;
  port: number;
}

export interface TunnelClient {
  start(): Promise<void>;
  /** Best-effort; resolves even when the transport is already gone. */
  stop(): Promise<void>;
  connect(token: string, key: Buffer, iv: Buffer): Promise<void>;
}

export type LifecycleHook = () => Promise<void>;

export type MessageHandler = (payload: unknown) => Promise<unknown>;

export interface ConnectionSupervisor {
  registerOnConnect(hook: LifecycleHook): void;
  registerOnDisconnect(hook: LifecycleHook): void;
  registerHandler(name: string, handler: MessageHandler): void;
}

export interface TargetAddress {
  host: string;
  port: number;
}

export type RelayMessage =
  | { type: 'authorize'; token: string; key: string; iv: string }
  | { type: 'session-open'; sessionId: string }
  | { type: 'session-data'; sessionId: string; data: string }
  | { type: 'session-close'; sessionId: string };

export interface IotMessage {
  msgid: string;
  handler: string;
  payload?: unknown;
}
