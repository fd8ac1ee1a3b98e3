import type { RemoteState } from './remote';

export enum RemoteEventType {
  STATE_CHANGED = 'state_changed',
  TUNNEL_STARTED = 'tunnel_started',
  TUNNEL_STOPPED = 'tunnel_stopped',
  SESSION_AUTHORIZED = 'session_authorized'
}

export interface RemoteEvent {
  type: RemoteEventType;
  timestamp: Date;
}

export interface StateChangedEvent extends RemoteEvent {
  type: RemoteEventType.STATE_CHANGED;
  previous: RemoteState;
  state: RemoteState;
}

export interface TunnelEvent extends RemoteEvent {
  type: RemoteEventType.TUNNEL_STARTED | RemoteEventType.TUNNEL_STOPPED;
  server: string;
}

export interface SessionAuthorizedEvent extends RemoteEvent {
  type: RemoteEventType.SESSION_AUTHORIZED;
  callerIp: string;
}
