import { ConnectorSource } from '../connectors/types';

export type RouteCategory = 'Greeting' | 'DomainQuery' | 'Unknown';

/** Which side wins when a message matches both greeting and domain patterns */
export type TieBreakPolicy = 'domain' | 'greeting';

export interface RoutingDecision {
  category: RouteCategory;
  /** 0..1 */
  confidence: number;
  rationale?: string;
  /** Patterns / entities that matched, in folded form */
  signals: string[];
  /** Record systems referenced by the domain signals */
  domains: ConnectorSource[];
}

export type RouterState = 'Start' | 'Classified' | 'Failed';

export interface RouterTransitionEvent {
  requestId: string;
  from: RouterState;
  to: RouterState;
  reason: string;
  timestamp: number;
}

/** Result of one classification run */
export type RouterOutcome =
  | { state: 'Classified'; decision: RoutingDecision }
  | { state: 'Failed'; reason: string };

/** Allowed router transitions; Classified and Failed are terminal */
export const ROUTER_TRANSITIONS: Record<RouterState, RouterState[]> = {
  Start: ['Classified', 'Failed'],
  Classified: [],
  Failed: [],
};

export interface RoutingConfig {
  greetingPatterns: string[];
  domainSignals: Record<ConnectorSource, string[]>;
  /** Below this a match is reported as Unknown */
  minConfidence: number;
  tieBreak: TieBreakPolicy;
  /** Longer input is treated as malformed */
  maxMessageLength: number;
}
