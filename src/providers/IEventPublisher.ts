/**
 * Advisory routing feedback, published after a query completes.
 * Consumers use it to tune routing; the query path never depends on it.
 */
export interface RoutingFeedbackEvent {
  eventId: string;
  queryId: string;
  traceId: string;
  routingMode: string;
  queriedDomains: string[];
  /** Domains with at least one item inside the synthesis window. */
  contributingDomains: string[];
  gapDomains: string[];
  emittedAt: Date;
}

export interface IEventPublisher {
  /** Best effort. Resolves once the attempt is over; never rejects. */
  publish(event: RoutingFeedbackEvent): Promise<void>;
  disconnect(): Promise<void>;
}
