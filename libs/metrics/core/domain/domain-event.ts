export type LoginStatus = "success" | "failure";

/**
 * Label set accepted for each business event. Each event maps to one
 * counter.
 */
export type DomainEventLabels = {
  user_registration: Record<string, never>;
  login_attempt: { status: LoginStatus };
  api_call: { service: string; operation: string };
  error: { error_type: string; service: string };
};

export type DomainEventName = keyof DomainEventLabels;

export const DOMAIN_EVENT_LABEL_NAMES: {
  [E in DomainEventName]: readonly (keyof DomainEventLabels[E] & string)[];
} = {
  user_registration: [],
  login_attempt: ["status"],
  api_call: ["service", "operation"],
  error: ["error_type", "service"],
};
