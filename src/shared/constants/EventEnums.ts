/**
 * Event types emitted by a round once per tick (batched).
 *
 * @module shared/constants/EventEnums
 */
export enum RoundEventType {
  AGENT_MODE_CHANGED = "agent:mode_changed",
  AGENT_CAUGHT = "agent:caught",
  AGENT_DESPAWNED = "agent:despawned",
  PLAYER_STRUCK = "player:struck",
  ROUND_CLEARED = "round:cleared",
}

export const ALL_ROUND_EVENT_TYPES: readonly RoundEventType[] =
  Object.values(RoundEventType);
