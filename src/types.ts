/**
 * Shapes of the Home Assistant websocket API that we consume.
 * https://developers.home-assistant.io/docs/api/websocket
 */

export interface HassEntityBase {
  entity_id: string;
  state: string;
  attributes: Record<string, unknown>;
  last_changed?: string;
  last_updated?: string;
}

export interface StateChangedEvent {
  event_type: "state_changed";
  data: {
    entity_id: string;
    old_state: HassEntityBase | null;
    new_state: HassEntityBase | null;
  };
  time_fired?: string;
}

export interface MessageBase {
  id?: number;
  type: string;
  [key: string]: unknown;
}

export interface ResultMessage extends MessageBase {
  id: number;
  type: "result";
  success: boolean;
  result?: unknown;
}

export interface EventMessage extends MessageBase {
  id: number;
  type: "event";
  event: {
    event_type?: string;
    data?: unknown;
  };
}

/**
 * State and attributes of one of our published sensors.
 */
export type SensorState = {
  state: number;
  attributes: Record<string, string | number>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function isMessage(value: unknown): value is MessageBase {
  return isRecord(value) && typeof value.type === "string";
}

export function isResultMessage(value: MessageBase): value is ResultMessage {
  return value.type === "result" && typeof value.id === "number";
}

export function isEventMessage(value: MessageBase): value is EventMessage {
  return (
    value.type === "event" &&
    typeof value.id === "number" &&
    isRecord(value.event)
  );
}

export function isHassEntity(value: unknown): value is HassEntityBase {
  return (
    isRecord(value) &&
    typeof value.entity_id === "string" &&
    typeof value.state === "string"
  );
}

export function isStateChangedData(
  value: unknown
): value is StateChangedEvent["data"] {
  return (
    isRecord(value) &&
    typeof value.entity_id === "string" &&
    (value.old_state === null || isHassEntity(value.old_state)) &&
    (value.new_state === null || isHassEntity(value.new_state))
  );
}
