export enum AgentLifecycle {
  CREATED = 'created',
  STARTED = 'started',
  STOPPED = 'stopped',
}

export const validTransitions: Record<AgentLifecycle, readonly AgentLifecycle[]> = {
  [AgentLifecycle.CREATED]: [AgentLifecycle.STARTED],
  [AgentLifecycle.STARTED]: [AgentLifecycle.STOPPED],
  [AgentLifecycle.STOPPED]: [], // Terminal state
} as const;

export function canTransition(from: AgentLifecycle, to: AgentLifecycle): boolean {
  return validTransitions[from].includes(to);
}
