/**
 * @file packages/shared/src/events/index.ts
 * @description Event bus contracts for agent, report and transport activity.
 */

// Core Event Interface
export interface FieldLinkEvent<T = unknown> {
  id: string;
  type: EventType;
  payload: T;
  source: string;
  timestamp: number;
  correlationId?: string;
}

// Mission lifecycle
export const MissionEvents = {
  ASSIGNED: 'mission:assigned',
  LOADED: 'mission:loaded',
  UNLOADED: 'mission:unloaded',
  REJECTED: 'mission:rejected',
} as const;

// Agent state machine
export const AgentEvents = {
  STATE_CHANGED: 'agent:state_changed',
  CYCLE_SKIPPED: 'agent:cycle_skipped',
} as const;

// Reports
export const ReportEvents = {
  EMITTED: 'report:emitted',
  SEND_FAILED: 'report:send_failed',
  RECEIVED: 'report:received',
} as const;

// Radio stand-ins
export const TransportEvents = {
  SENT: 'transport:sent',
} as const;

export type EventType =
  | (typeof MissionEvents)[keyof typeof MissionEvents]
  | (typeof AgentEvents)[keyof typeof AgentEvents]
  | (typeof ReportEvents)[keyof typeof ReportEvents]
  | (typeof TransportEvents)[keyof typeof TransportEvents];
