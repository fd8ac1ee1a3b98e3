import { EventEmitter } from 'events';
import type { SecureContext } from 'tls';
import { logger } from '../utils/logger';
import { RemoteBackendError, RemoteError, RemoteNotConnected, TimeoutError } from '../utils/errors';
import { generateAesKeyset, isRecord, withTimeout } from '../utils/helpers';
import { createServerContext } from '../utils/tls';
import { RemoteEventType } from '../types/events';
import { RemoteState } from '../types/remote';
import type {
  BackendClient,
  BackendResponse,
  CertificateHandler,
  ConnectionSupervisor,
  InstanceRegistration,
  SessionToken,
  TunnelClient,
  TunnelClientOptions
} from '../types/remote';

export interface RemoteServiceOptions {
  createCertificateHandler: (domain: string, email: string) => CertificateHandler;
  createTunnelClient: (options: TunnelClientOptions) => TunnelClient;
  createContext?: (fullchainPath: string, privateKeyPath: string) => Promise<SecureContext>;
  backendTimeout?: number;
  relayPort?: number;
}

export const REMOTE_SNI_HANDLER = 'remote_sni';

function isRegistration(body: unknown): body is InstanceRegistration {
  return isRecord(body)
    && typeof body.domain === 'string'
    && typeof body.email === 'string'
    && typeof body.server === 'string';
}

function isSessionToken(body: unknown): body is SessionToken {
  return isRecord(body) && typeof body.token === 'string';
}

/**
 * Drives the remote UI lifecycle: instance registration, certificate,
 * relay tunnel and per-session token exchange.
 *
 * Only one token exchange runs at a time. `closeBackend` bumps a generation
 * counter so that loads and token exchanges started before the teardown
 * never touch the tunnel afterwards.
 */
export class RemoteService extends EventEmitter {
  private backend: BackendClient;
  private options: RemoteServiceOptions;
  private currentState: RemoteState = RemoteState.UNLOADED;
  private acme?: CertificateHandler;
  private tunnel?: TunnelClient;
  private currentRegistration?: InstanceRegistration;
  private currentServer?: string;
  private loading?: { generation: number; promise: Promise<void> };
  private generation = 0;

  constructor(iot: ConnectionSupervisor, backend: BackendClient, options: RemoteServiceOptions) {
    super();
    this.backend = backend;
    this.options = options;

    iot.registerOnConnect(() => this.loadBackend());
    iot.registerOnDisconnect(() => this.closeBackend());
    iot.registerHandler(REMOTE_SNI_HANDLER, (payload) => this.handleSniRequest(payload));
  }

  public get state(): RemoteState {
    return this.currentState;
  }

  /** Relay server of the active tunnel. */
  public get relayServer(): string | undefined {
    return this.currentServer;
  }

  public get registration(): InstanceRegistration | undefined {
    return this.currentRegistration;
  }

  public get certificateHandler(): CertificateHandler | undefined {
    return this.acme;
  }

  public get tunnelClient(): TunnelClient | undefined {
    return this.tunnel;
  }

  public async loadBackend(): Promise<void> {
    if (this.tunnel) {
      return;
    }
    // A load started before the last close is bound to fail, don't join it
    if (this.loading && this.loading.generation === this.generation) {
      return this.loading.promise;
    }

    const load = { generation: this.generation, promise: this.startBackend() };
    this.loading = load;
    try {
      await load.promise;
    } finally {
      if (this.loading === load) {
        this.loading = undefined;
      }
    }
  }

  public async closeBackend(): Promise<void> {
    const tunnel = this.tunnel;

    this.generation += 1;
    this.tunnel = undefined;
    this.acme = undefined;
    this.currentRegistration = undefined;
    const server = this.currentServer;
    this.currentServer = undefined;
    this.setState(RemoteState.UNLOADED);

    if (!tunnel) {
      return;
    }

    try {
      await tunnel.stop();
    } catch (err) {
      logger.warn('Error while stopping remote tunnel:', err);
    }
    if (server) {
      this.emit(RemoteEventType.TUNNEL_STOPPED, {
        type: RemoteEventType.TUNNEL_STOPPED,
        timestamp: new Date(),
        server
      });
    }
  }

  public async handleConnectionRequest(callerIp: string): Promise<void> {
    const tunnel = this.tunnel;
    if (!tunnel || this.currentState !== RemoteState.TUNNEL_ACTIVE) {
      throw new RemoteNotConnected();
    }

    const generation = this.generation;
    this.setState(RemoteState.TOKEN_PENDING);

    try {
      const { key, iv } = generateAesKeyset();
      const resp = await this.callBackend('session token', () => this.backend.requestSessionToken(key, iv));
      if (!isSessionToken(resp.body)) {
        logger.error('Session token answer from backend is malformed');
        throw new RemoteBackendError();
      }

      if (generation !== this.generation) {
        throw new RemoteNotConnected('Remote tunnel was closed during token exchange');
      }

      await tunnel.connect(resp.body.token, key, iv);
      logger.info(`Authorized remote session for ${callerIp}`);
      this.emit(RemoteEventType.SESSION_AUTHORIZED, {
        type: RemoteEventType.SESSION_AUTHORIZED,
        timestamp: new Date(),
        callerIp
      });
    } finally {
      if (generation === this.generation) {
        this.setState(RemoteState.TUNNEL_ACTIVE);
      }
    }
  }

  private async startBackend(): Promise<void> {
    const generation = this.generation;

    const resp = await this.callBackend('instance registration', () => this.backend.registerInstance());
    if (!isRegistration(resp.body)) {
      logger.error("Can't update remote details: malformed registration answer");
      throw new RemoteBackendError();
    }
    const registration = resp.body;
    if (generation !== this.generation) {
      throw new RemoteNotConnected('Remote backend was closed while loading');
    }

    try {
      this.currentRegistration = registration;
      this.acme = this.options.createCertificateHandler(registration.domain, registration.email);
      this.setState(RemoteState.BACKEND_LOADED);

      const tunnel = await this.startTunnel(this.acme, registration.server);
      if (generation !== this.generation) {
        try {
          await tunnel.stop();
        } catch (err) {
          logger.warn('Error while stopping stale remote tunnel:', err);
        }
        throw new RemoteNotConnected('Remote backend was closed while loading');
      }

      this.tunnel = tunnel;
      this.currentServer = registration.server;
      this.setState(RemoteState.TUNNEL_ACTIVE);
      this.emit(RemoteEventType.TUNNEL_STARTED, {
        type: RemoteEventType.TUNNEL_STARTED,
        timestamp: new Date(),
        server: registration.server
      });
    } catch (err) {
      // After a close, a newer load may own these fields
      if (generation === this.generation) {
        this.acme = undefined;
        this.currentRegistration = undefined;
        this.setState(RemoteState.UNLOADED);
      }
      throw err;
    }
  }

  private async startTunnel(acme: CertificateHandler, server: string): Promise<TunnelClient> {
    if (!(await acme.isValidCertificate())) {
      logger.info(`No valid certificate for ${acme.domain}, requesting a new one`);
      await acme.issueCertificate();
    }

    const createContext = this.options.createContext ?? createServerContext;
    const context = await createContext(acme.pathFullchain, acme.pathPrivateKey);

    const tunnel = this.options.createTunnelClient({
      context,
      server,
      port: this.options.relayPort ?? 443
    });
    await tunnel.start();
    logger.info(`Remote tunnel running over ${server}`);
    return tunnel;
  }

  private async callBackend(action: string, call: () => Promise<BackendResponse>): Promise<BackendResponse> {
    let resp: BackendResponse;
    try {
      resp = await withTimeout(call(), this.options.backendTimeout ?? 10000);
    } catch (err) {
      if (err instanceof TimeoutError) {
        logger.error(`Remote backend timed out on ${action}`);
      } else {
        logger.error(`Remote backend failed on ${action}:`, err);
      }
      throw new RemoteBackendError(undefined, { cause: err });
    }

    if (resp.status !== 200) {
      logger.error(`Can't complete ${action} with the remote backend (status ${resp.status})`);
      throw new RemoteBackendError();
    }
    return resp;
  }

  private async handleSniRequest(payload: unknown): Promise<{ server: string | undefined }> {
    if (!isRecord(payload) || typeof payload.ip_address !== 'string') {
      throw new RemoteError('Connection request without caller address');
    }
    await this.handleConnectionRequest(payload.ip_address);
    return { server: this.currentServer };
  }

  private setState(state: RemoteState): void {
    const previous = this.currentState;
    if (previous === state) {
      return;
    }
    this.currentState = state;
    this.emit(RemoteEventType.STATE_CHANGED, {
      type: RemoteEventType.STATE_CHANGED,
      timestamp: new Date(),
      previous,
      state
    });
  }
}
