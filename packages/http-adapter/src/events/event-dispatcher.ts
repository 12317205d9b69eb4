import { Logger, type LoggerLike } from '@switchyard/logger';

import { KernelStage } from '../enums';

import type { EventSubscriber, KernelListener, SubscribedListener } from './interfaces';
import type { KernelEventMap } from './kernel-events';

interface ListenerEntry<S extends KernelStage> {
  readonly listener: KernelListener<S>;
  readonly priority: number;
}

type ListenerRegistry = { [S in KernelStage]: ListenerEntry<S>[] };

/**
 * Runs the listeners of a stage one after another, highest priority first and in
 * registration order within a priority.
 */
export class EventDispatcher {
  private readonly registry: ListenerRegistry = {
    [KernelStage.RequestStart]: [],
    [KernelStage.RouteMatched]: [],
    [KernelStage.ArgumentsResolving]: [],
    [KernelStage.ActionInvoking]: [],
    [KernelStage.ResponseReady]: [],
    [KernelStage.Exception]: [],
    [KernelStage.RequestEnd]: [],
  };

  constructor(private readonly logger: LoggerLike = new Logger(EventDispatcher.name)) {}

  addListener<S extends KernelStage>(stage: S, listener: KernelListener<S>, priority = 0): this {
    const entries: ListenerEntry<S>[] = this.registry[stage];

    entries.push({ listener, priority });
    entries.sort((a, b) => b.priority - a.priority);

    this.logger.log('debug', 'Listener added', { stage, priority, listener: listener.name || 'anonymous' });

    return this;
  }

  addSubscriber(subscriber: EventSubscriber): this {
    const events = subscriber.subscribedEvents();

    this.subscribe(KernelStage.RequestStart, events[KernelStage.RequestStart]);
    this.subscribe(KernelStage.RouteMatched, events[KernelStage.RouteMatched]);
    this.subscribe(KernelStage.ArgumentsResolving, events[KernelStage.ArgumentsResolving]);
    this.subscribe(KernelStage.ActionInvoking, events[KernelStage.ActionInvoking]);
    this.subscribe(KernelStage.ResponseReady, events[KernelStage.ResponseReady]);
    this.subscribe(KernelStage.Exception, events[KernelStage.Exception]);
    this.subscribe(KernelStage.RequestEnd, events[KernelStage.RequestEnd]);

    return this;
  }

  removeListener<S extends KernelStage>(stage: S, listener: KernelListener<S>): boolean {
    const entries: ListenerEntry<S>[] = this.registry[stage];
    const index = entries.findIndex(entry => entry.listener === listener);

    if (index === -1) {
      return false;
    }

    entries.splice(index, 1);

    return true;
  }

  getListeners<S extends KernelStage>(stage: S): KernelListener<S>[] {
    const entries: ListenerEntry<S>[] = this.registry[stage];

    return entries.map(entry => entry.listener);
  }

  hasListeners(stage: KernelStage): boolean {
    return this.registry[stage].length > 0;
  }

  /**
   * Awaits each listener in turn until one stops propagation. The request's abort signal
   * is checked before every listener.
   */
  async dispatch<S extends KernelStage>(stage: S, event: KernelEventMap[S]): Promise<KernelEventMap[S]> {
    const entries: ListenerEntry<S>[] = [...this.registry[stage]];

    for (const { listener } of entries) {
      if (event.isPropagationStopped()) {
        break;
      }

      event.context.throwIfAborted(stage);

      await listener(event);
    }

    return event;
  }

  private subscribe<S extends KernelStage>(
    stage: S,
    subscribed: SubscribedListener<S> | readonly SubscribedListener<S>[] | undefined,
  ): void {
    if (subscribed === undefined) {
      return;
    }

    const list: readonly SubscribedListener<S>[] = 'listener' in subscribed ? [subscribed] : subscribed;

    for (const { listener, priority } of list) {
      this.addListener(stage, listener, priority);
    }
  }
}
