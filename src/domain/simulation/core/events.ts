import { BatchedEventEmitter } from "./BatchedEventEmitter";
import {
  RoundEventType,
  ALL_ROUND_EVENT_TYPES,
} from "../../../shared/constants/EventEnums";
import type { BehaviorMode, DayNightSignal } from "../../../shared/constants/BehaviorEnums";
import type { Vec2 } from "../../../shared/types/navigation";

export interface AgentModeChangedEvent {
  agentId: string;
  from: BehaviorMode;
  to: BehaviorMode;
  signal: DayNightSignal;
  tick: number;
}

export interface AgentCaughtEvent {
  agentId: string;
  position: Vec2;
  time: number;
}

export interface AgentDespawnedEvent {
  agentId: string;
  time: number;
}

export interface PlayerStruckEvent {
  agentId: string;
  mode: BehaviorMode;
  playerPosition: Vec2;
  time: number;
}

export interface RoundClearedEvent {
  tick: number;
  time: number;
}

/**
 * Payload carried by each round event.
 */
export interface RoundEventPayloads {
  [RoundEventType.AGENT_MODE_CHANGED]: AgentModeChangedEvent;
  [RoundEventType.AGENT_CAUGHT]: AgentCaughtEvent;
  [RoundEventType.AGENT_DESPAWNED]: AgentDespawnedEvent;
  [RoundEventType.PLAYER_STRUCK]: PlayerStruckEvent;
  [RoundEventType.ROUND_CLEARED]: RoundClearedEvent;
}

/**
 * Per-round emitter; queued during a tick and flushed at its end.
 */
export class RoundEventBus extends BatchedEventEmitter<RoundEventPayloads> {}

export { RoundEventType, ALL_ROUND_EVENT_TYPES };
