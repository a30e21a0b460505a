import { Logger } from '../utils/logger.js';

import { LifecycleError } from './errors.js';
import { AgentLifecycle, canTransition } from './lifecycle.js';

/**
 * Guarded CREATED -> STARTED -> STOPPED lifecycle shared by every agent.
 *
 * Subclasses put their work in `onStart` / `onStop` and call
 * `assertStarted` at the top of every other operation. Callers must
 * serialize calls on one instance: anything arriving while a transition is
 * suspended is rejected rather than queued.
 */
export abstract class BaseAgent<TStartArgs extends unknown[] = []> {
  private lifecycle: AgentLifecycle = AgentLifecycle.CREATED;
  private transitioning = false;
  private startFailed = false;
  protected readonly logger: Logger;

  protected constructor(public readonly name: string) {
    this.logger = Logger.getInstance(name);
  }

  get status(): AgentLifecycle {
    return this.lifecycle;
  }

  async start(...args: TStartArgs): Promise<void> {
    this.ensureTransition('start', AgentLifecycle.STARTED);
    if (this.startFailed) {
      throw new LifecycleError(
        this.name,
        this.lifecycle,
        'start',
        `${this.name}: a previous start failed; create a new instance`,
      );
    }

    this.transitioning = true;
    try {
      await this.onStart(...args);
    } catch (error) {
      this.startFailed = true;
      this.logger.debug('Start failed', { agent: this.name, event: 'start-failed' });
      throw error;
    } finally {
      this.transitioning = false;
    }

    this.lifecycle = AgentLifecycle.STARTED;
    this.logger.debug('Started', { agent: this.name, event: 'started' });
  }

  async stop(): Promise<void> {
    this.ensureTransition('stop', AgentLifecycle.STOPPED);

    this.transitioning = true;
    try {
      await this.onStop();
    } finally {
      this.transitioning = false;
      this.lifecycle = AgentLifecycle.STOPPED;
      this.logger.debug('Stopped', { agent: this.name, event: 'stopped' });
    }
  }

  protected abstract onStart(...args: TStartArgs): void | Promise<void>;

  protected onStop(): void | Promise<void> {}

  protected assertStarted(operation: string): void {
    this.assertIn(operation, [AgentLifecycle.STARTED]);
  }

  protected assertIn(operation: string, allowed: readonly AgentLifecycle[]): void {
    if (this.transitioning) {
      throw new LifecycleError(
        this.name,
        this.lifecycle,
        operation,
        `${this.name}: cannot ${operation} while a lifecycle transition is in progress`,
      );
    }
    if (!allowed.includes(this.lifecycle)) {
      throw new LifecycleError(this.name, this.lifecycle, operation);
    }
  }

  private ensureTransition(operation: string, to: AgentLifecycle): void {
    if (this.transitioning) {
      throw new LifecycleError(
        this.name,
        this.lifecycle,
        operation,
        `${this.name}: cannot ${operation} while a lifecycle transition is in progress`,
      );
    }
    if (!canTransition(this.lifecycle, to)) {
      throw new LifecycleError(
        this.name,
        this.lifecycle,
        operation,
        `Invalid agent transition ${this.lifecycle} -> ${to} for ${this.name}`,
      );
    }
  }
}
