import { EventEmitter } from "node:events";

export type DomainEvent = {
  type: "task.transition";
  tenant_id: string;
  timestamp: string;
  payload: Record<string, unknown>;
};

const bus = new EventEmitter();
bus.setMaxListeners(0);

// One channel per tenant, so a subscriber never sees another tenant's events.
function channel(tenant_id: string): string {
  return `tenant:${tenant_id}`;
}

export function publishEvent(event: DomainEvent): void {
  bus.emit(channel(event.tenant_id), event);
}

export function subscribeEvents(tenant_id: string, listener: (event: DomainEvent) => void): () => void {
  const name = channel(tenant_id);
  bus.on(name, listener);
  return () => bus.off(name, listener);
}

export function subscriberCount(tenant_id: string): number {
  return bus.listenerCount(channel(tenant_id));
}
