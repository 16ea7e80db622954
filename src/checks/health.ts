import type { JsonValue } from "../types/redfish";
import { isRedfishResource } from "../types/redfish";

export enum State {
  OK = 0,
  WARN = 1,
  CRIT = 2,
  UNKNOWN = 3
}

export const STATE_LABELS: Record<State, string> = {
  [State.OK]: "OK",
  [State.WARN]: "WARN",
  [State.CRIT]: "CRIT",
  [State.UNKNOWN]: "UNKNOWN"
};

type StateText = [State, string];

const HEALTH_MAP: Record<string, StateText> = {
  OK: [State.OK, "Normal"],
  Warning: [State.WARN, "A condition requires attention."],
  Critical: [State.CRIT, "A critical condition requires immediate attention."]
};

const STATE_MAP: Record<string, StateText> = {
  Enabled: [State.OK, "This resource is enabled."],
  Disabled: [State.WARN, "This resource is disabled."],
  StandbyOffline: [State.WARN, "This resource is enabled but awaits an external action to activate it."],
  StandbySpare: [
    State.OK,
    "This resource is part of a redundancy set and awaits a failover or other external action to activate it."
  ],
  InTest: [
    State.OK,
    "This resource is undergoing testing, or is in the process of capturing information for debugging."
  ],
  Starting: [State.OK, "This resource is starting."],
  Absent: [State.WARN, "This resource is either not present or detected."],
  Updating: [State.WARN, "The element is updating and may be unavailable or degraded"],
  UnavailableOffline: [State.WARN, "This function or resource is present but cannot be used"],
  Deferring: [State.OK, "The element will not process any commands but will queue new requests"],
  Quiesced: [State.OK, "The element is enabled but only processes a restricted set of commands"]
};

export interface HealthResult {
  state: State;
  text: string;
}

function lookup(map: Record<string, StateText>, key: string, value: string): StateText {
  return Object.prototype.hasOwnProperty.call(map, value)
    ? map[value]
    : [State.UNKNOWN, `Unknown ${key} value '${value}'`];
}

export function worstState(states: readonly State[]): State {
  return states.reduce<State>((worst, s) => (s > worst ? s : worst), State.OK);
}

/** Maps a Redfish `Status` object onto a monitoring state and message. */
export function redfishHealthState(status: JsonValue | undefined): HealthResult {
  const states: State[] = [];
  const messages: string[] = [];

  if (isRedfishResource(status)) {
    for (const [key, value] of Object.entries(status)) {
      if (typeof value !== "string") {
        continue;
      }
      if (key === "Health") {
        const [state, text] = lookup(HEALTH_MAP, key, value);
        states.push(state);
        messages.push(`Component State: ${text}`);
      } else if (key === "HealthRollup") {
        const [state, text] = lookup(HEALTH_MAP, key, value);
        states.push(state);
        messages.push(`Rollup State: ${text}`);
      } else if (key === "State") {
        const [state, text] = lookup(STATE_MAP, key, value);
        states.push(state);
        messages.push(text);
      }
    }
  }

  if (messages.length === 0) {
    messages.push("No state information found");
  }
  return { state: worstState(states), text: messages.join(", ") };
}
