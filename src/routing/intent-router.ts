import { ConnectorSource, CONNECTOR_SOURCES } from '../connectors/types';
import { logger } from '../observability/logger';
import { routingDecisions } from '../observability/metrics';
import { builtInRoutingConfig } from './routing-config';
import { RouterStateMachine } from './state-machine';
import { compilePattern, extractContactHints, foldText } from './text';
import { RouterOutcome, RouterState, RoutingConfig, RoutingDecision } from './types';

interface CompiledPattern {
  /** Folded pattern text, reported back as a signal */
  pattern: string;
  re: RegExp;
}

const LEADING_GREETING_CONFIDENCE = 0.9;
const INLINE_GREETING_CONFIDENCE = 0.6;
const FIRST_DOMAIN_SIGNAL_CONFIDENCE = 0.6;
const EXTRA_DOMAIN_SIGNAL_CONFIDENCE = 0.15;
const MAX_DOMAIN_CONFIDENCE = 0.95;

function compileAll(patterns: string[]): CompiledPattern[] {
  const seen = new Set<string>();
  const compiled: CompiledPattern[] = [];
  for (const raw of patterns) {
    const pattern = foldText(raw).trim();
    if (!pattern || seen.has(pattern)) continue;
    seen.add(pattern);
    compiled.push({ pattern, re: compilePattern(pattern) });
  }
  return compiled;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Classifies a message as Greeting, DomainQuery or Unknown.
 *
 * Classification is a pure function of the message text and the configured
 * patterns: no history, no clock, no I/O. Each call walks the router state
 * machine from Start to exactly one terminal state.
 */
export class IntentRouter {
  private readonly greeting: CompiledPattern[];
  private readonly domain: { source: ConnectorSource; patterns: CompiledPattern[] }[];

  constructor(
    private readonly config: RoutingConfig = builtInRoutingConfig(),
    private readonly fsm: RouterStateMachine = new RouterStateMachine(),
  ) {
    this.greeting = compileAll(config.greetingPatterns);
    this.domain = CONNECTOR_SOURCES.map((source) => ({
      source,
      patterns: compileAll(config.domainSignals[source]),
    }));
  }

  get tieBreak(): RoutingConfig['tieBreak'] {
    return this.config.tieBreak;
  }

  classify(message: unknown, requestId = 'unscoped'): RouterOutcome {
    const state: RouterState = 'Start';
    if (typeof message !== 'string' || message.trim().length === 0) {
      return this.settle(requestId, state, { state: 'Failed', reason: 'message must be a non-empty string' });
    }
    if (message.length > this.config.maxMessageLength) {
      return this.settle(requestId, state, {
        state: 'Failed',
        reason: `message exceeds ${this.config.maxMessageLength} characters`,
      });
    }
    return this.settle(requestId, state, { state: 'Classified', decision: this.decide(message) });
  }

  /** Step the state machine toward the proposed outcome; a rejected step ends in Failed */
  private settle(requestId: string, from: RouterState, proposed: RouterOutcome): RouterOutcome {
    const reason = proposed.state === 'Classified' ? proposed.decision.category : proposed.reason;
    const { newState } = this.fsm.transition(requestId, from, proposed.state, reason);

    let outcome: RouterOutcome = proposed;
    if (newState !== proposed.state || !this.fsm.isTerminal(newState)) {
      outcome = { state: 'Failed', reason: `invalid router transition ${from} -> ${proposed.state}` };
    }

    if (outcome.state === 'Classified') {
      routingDecisions.inc({ category: outcome.decision.category });
    } else {
      routingDecisions.inc({ category: 'Failed' });
      logger.warn({ requestId, reason: outcome.reason }, 'Intent classification failed');
    }
    return outcome;
  }

  private decide(message: string): RoutingDecision {
    const folded = foldText(message);

    let leading = false;
    const greetingSignals: string[] = [];
    for (const { pattern, re } of this.greeting) {
      const m = re.exec(folded);
      if (!m) continue;
      greetingSignals.push(pattern);
      const prefix = folded.slice(0, m.index + m[0].length - m[1].length);
      if (/^[^a-z0-9]*$/.test(prefix)) leading = true;
    }

    const domains: ConnectorSource[] = [];
    const domainSignals: string[] = [];
    for (const { source, patterns } of this.domain) {
      const hits = patterns.filter((p) => p.re.test(folded)).map((p) => p.pattern);
      if (hits.length === 0) continue;
      domains.push(source);
      for (const hit of hits) {
        if (!domainSignals.includes(hit)) domainSignals.push(hit);
      }
    }
    const hints = extractContactHints(message);
    if (hints.email) domainSignals.push('entity:email');
    if (hints.phone) domainSignals.push('entity:phone');

    const greetingConfidence = greetingSignals.length === 0
      ? 0
      : leading ? LEADING_GREETING_CONFIDENCE : INLINE_GREETING_CONFIDENCE;
    const domainConfidence = domainSignals.length === 0
      ? 0
      : round2(Math.min(
          MAX_DOMAIN_CONFIDENCE,
          FIRST_DOMAIN_SIGNAL_CONFIDENCE + EXTRA_DOMAIN_SIGNAL_CONFIDENCE * (domainSignals.length - 1),
        ));

    const signals = [...greetingSignals, ...domainSignals];
    const { minConfidence, tieBreak } = this.config;

    if (greetingConfidence > 0 && domainConfidence > 0) {
      if (tieBreak === 'domain' && domainConfidence >= minConfidence) {
        return {
          category: 'DomainQuery',
          confidence: domainConfidence,
          rationale: 'greeting and domain signals matched; tie broken toward domain',
          signals,
          domains,
        };
      }
      if (tieBreak === 'greeting' && greetingConfidence >= minConfidence) {
        return {
          category: 'Greeting',
          confidence: greetingConfidence,
          rationale: 'greeting and domain signals matched; tie broken toward greeting',
          signals,
          domains: [],
        };
      }
    }

    if (greetingConfidence >= minConfidence && greetingConfidence >= domainConfidence) {
      return {
        category: 'Greeting',
        confidence: greetingConfidence,
        rationale: leading ? 'message opens with a greeting' : 'greeting pattern matched',
        signals,
        domains: [],
      };
    }

    if (domainConfidence >= minConfidence) {
      return {
        category: 'DomainQuery',
        confidence: domainConfidence,
        rationale: `domain signals matched: ${domainSignals.join(', ')}`,
        signals,
        domains,
      };
    }

    const best = Math.max(greetingConfidence, domainConfidence);
    return {
      category: 'Unknown',
      confidence: best,
      rationale: best === 0 ? 'no greeting or domain signal' : `best match below ${minConfidence}`,
      signals,
      domains: [],
    };
  }
}
