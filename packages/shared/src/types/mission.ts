/**
 * @file packages/shared/src/types/mission.ts
 * @description Mission profile, trigger and report packet contracts.
 */

import { z } from 'zod';
import { parseCondition } from '../condition.js';
import { DESTINATIONS, MAX_MONITORING_INTERVAL_SECONDS, TRANSPORT_PROTOCOLS } from '../constants.js';

// ─── Triggers ─────────────────────────────────────────────────

export const TriggerSpecSchema = z.object({
  trigger_name: z.string().min(1),
  condition: z.string().min(1),
  report_level: z.string().min(1),
  cooldown_seconds: z.number().nonnegative(),
});
export type TriggerSpec = z.infer<typeof TriggerSpecSchema>;

// ─── Communication ────────────────────────────────────────────

export const TransportProtocolSchema = z.enum(TRANSPORT_PROTOCOLS);
export type TransportProtocol = z.infer<typeof TransportProtocolSchema>;

export const DestinationSchema = z.enum(DESTINATIONS);
export type Destination = z.infer<typeof DestinationSchema>;

export const CommunicationSchema = z.object({
  protocol: TransportProtocolSchema,
  target: z.string().min(1),
  destination: DestinationSchema.default('remote'),
});
export type Communication = z.infer<typeof CommunicationSchema>;

// ─── Mission Profile ──────────────────────────────────────────

export const MissionParametersSchema = z
  .object({
    value_to_monitor: z.string().min(1),
    monitoring_interval_seconds: z
      .number()
      .positive()
      .max(MAX_MONITORING_INTERVAL_SECONDS, `must be at most ${MAX_MONITORING_INTERVAL_SECONDS} seconds`),
  })
  .passthrough();
export type MissionParameters = z.infer<typeof MissionParametersSchema>;

const MissionProfileShape = z.object({
  mission_id: z.string().min(1),
  agent_id_target: z.string().min(1),
  function_name: z.string().min(1),
  /** Lower value means more urgent; 0 is the highest priority. */
  priority: z.number().int().nonnegative(),
  active: z.boolean().default(true),
  parameters: MissionParametersSchema,
  triggers: z.array(TriggerSpecSchema).min(1, 'mission must declare at least one trigger'),
  communication: CommunicationSchema,
});

export const MissionProfileSchema = MissionProfileShape.superRefine((profile, ctx) => {
  const seen = new Set<string>();
  profile.triggers.forEach((trigger, index) => {
    if (seen.has(trigger.trigger_name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['triggers', index, 'trigger_name'],
        message: `duplicate trigger name "${trigger.trigger_name}"`,
      });
    }
    seen.add(trigger.trigger_name);

    const parsed = parseCondition(trigger.condition);
    if (!parsed.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['triggers', index, 'condition'],
        message: parsed.reason,
      });
    }
  });
});

/** Profile as written by a planner, before defaults are applied. */
export type MissionProfileInput = z.input<typeof MissionProfileSchema>;
export type MissionProfile = z.output<typeof MissionProfileSchema>;

// ─── Report Packet ────────────────────────────────────────────

export const ReportPacketSchema = z.object({
  timestamp: z.number().int(),
  agent_id: z.string(),
  mission_id: z.string(),
  trigger_fired: z.string(),
  report_level: z.string(),
  measured_value: z.number(),
  mission_function: z.string(),
});
export type ReportPacket = z.infer<typeof ReportPacketSchema>;

// ─── Agent State ──────────────────────────────────────────────

export const AgentStateSchema = z.enum(['IDLE', 'MONITORING', 'REPORTING']);
export type AgentState = z.infer<typeof AgentStateSchema>;
