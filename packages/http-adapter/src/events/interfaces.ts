import type { MaybePromise } from '@switchyard/common';

import type { KernelStage } from '../enums';

import type { KernelEventMap } from './kernel-events';

export type KernelListener<S extends KernelStage> = (event: KernelEventMap[S]) => MaybePromise<void>;

export interface SubscribedListener<S extends KernelStage> {
  readonly listener: KernelListener<S>;
  /** @default 0 */
  readonly priority?: number;
}

export type SubscribedEvents = {
  readonly [S in KernelStage]?: SubscribedListener<S> | readonly SubscribedListener<S>[];
};

/**
 * A listener object that declares its own stages and priorities.
 */
export interface EventSubscriber {
  subscribedEvents(): SubscribedEvents;
}
