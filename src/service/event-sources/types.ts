import { SeverityFilter } from '../../types';

export interface SubscriptionHandle {
  unsubscribe(): void;
}

/**
 * A platform event source. The core only registers a callback and a
 * severity filter; the source owns its session.
 */
export interface EventSource<T> {
  readonly name: string;
  subscribe(filter: SeverityFilter, onEvent: (event: T) => void): SubscriptionHandle;
}
