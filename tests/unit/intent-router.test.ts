import * as path from 'path';
import { IntentRouter } from '../../src/routing/intent-router';
import { builtInRoutingConfig, loadRoutingConfig } from '../../src/routing/routing-config';
import { RouterStateMachine } from '../../src/routing/state-machine';
import { RouterOutcome, RoutingDecision } from '../../src/routing/types';

const ROUTING_YAML = path.resolve(__dirname, '../../config/routing.yaml');

function decisionOf(outcome: RouterOutcome): RoutingDecision {
  if (outcome.state !== 'Classified') throw new Error(`expected Classified, got Failed: ${outcome.reason}`);
  return outcome.decision;
}

describe('IntentRouter', () => {
  const config = loadRoutingConfig(ROUTING_YAML);
  let router: IntentRouter;

  beforeEach(() => {
    router = new IntentRouter(config);
  });

  describe('greetings', () => {
    it('should classify "Olá" as Greeting', () => {
      const decision = decisionOf(router.classify('Olá'));
      expect(decision.category).toBe('Greeting');
      expect(decision.confidence).toBe(0.9);
      expect(decision.signals).toEqual(['ola']);
      expect(decision.domains).toEqual([]);
    });

    it('should fold case and accents', () => {
      const decision = decisionOf(router.classify('BOM DIA!'));
      expect(decision.category).toBe('Greeting');
      expect(decision.signals).toEqual(['bom dia']);
    });

    it('should score a greeting inside a sentence lower than a leading one', () => {
      const decision = decisionOf(router.classify('Eu disse oi para ela'));
      expect(decision.category).toBe('Greeting');
      expect(decision.confidence).toBe(0.6);
    });

    it('should only match whole words', () => {
      const decision = decisionOf(router.classify('this is history'));
      expect(decision.category).toBe('Unknown');
      expect(decision.signals).toEqual([]);
    });
  });

  describe('domain queries', () => {
    it('should route a contact score question to the CRM', () => {
      const decision = decisionOf(router.classify('Qual o score do contato ana@example.com?'));
      expect(decision).toEqual({
        category: 'DomainQuery',
        confidence: 0.9,
        rationale: 'domain signals matched: contato, score, entity:email',
        signals: ['contato', 'score', 'entity:email'],
        domains: ['crm'],
      });
    });

    it('should target both systems when crm and marketing signals appear', () => {
      const decision = decisionOf(router.classify('Em qual campanha o contato ana@example.com entrou por último?'));
      expect(decision.category).toBe('DomainQuery');
      expect(decision.signals).toEqual(['contato', 'campanha', 'entity:email']);
      expect(decision.domains).toEqual(['crm', 'marketing']);
    });

    it('should treat a bare email address as a domain signal with no specific system', () => {
      const decision = decisionOf(router.classify('ana@example.com'));
      expect(decision.category).toBe('DomainQuery');
      expect(decision.confidence).toBe(0.6);
      expect(decision.domains).toEqual([]);
    });
  });

  describe('tie-break', () => {
    const message = 'Oi, qual o score do contato bruno@example.com?';

    it('should prefer the domain query by default', () => {
      const decision = decisionOf(router.classify(message));
      expect(decision.category).toBe('DomainQuery');
      expect(decision.rationale).toBe('greeting and domain signals matched; tie broken toward domain');
      expect(decision.signals).toEqual(['oi', 'contato', 'score', 'entity:email']);
      expect(decision.domains).toEqual(['crm']);
    });

    it('should prefer the greeting when configured', () => {
      const greetingFirst = new IntentRouter({ ...config, tieBreak: 'greeting' });
      const decision = decisionOf(greetingFirst.classify(message));
      expect(decision.category).toBe('Greeting');
      expect(decision.confidence).toBe(0.9);
      expect(decision.domains).toEqual([]);
    });
  });

  describe('unknown', () => {
    it('should classify a message with no signal as Unknown', () => {
      const decision = decisionOf(router.classify('Qual a capital da França?'));
      expect(decision).toEqual({
        category: 'Unknown',
        confidence: 0,
        rationale: 'no greeting or domain signal',
        signals: [],
        domains: [],
      });
    });

    it('should report matches below minConfidence as Unknown', () => {
      const strict = new IntentRouter({ ...config, minConfidence: 0.7 });
      const decision = decisionOf(strict.classify('Eu disse oi para ela'));
      expect(decision.category).toBe('Unknown');
      expect(decision.confidence).toBe(0.6);
      expect(decision.rationale).toBe('best match below 0.7');
    });
  });

  describe('failures', () => {
    it.each(['', '   ', 42, null, undefined])('should fail on malformed input %p', (input) => {
      expect(router.classify(input)).toEqual({ state: 'Failed', reason: 'message must be a non-empty string' });
    });

    it('should fail on oversized input', () => {
      expect(router.classify('a'.repeat(4001))).toEqual({
        state: 'Failed',
        reason: 'message exceeds 4000 characters',
      });
    });
  });

  describe('state machine', () => {
    it('should end in Failed when the classified step is not allowed', () => {
      const failOnly = new RouterStateMachine({ Start: ['Failed'], Classified: [], Failed: [] });
      const guarded = new IntentRouter(builtInRoutingConfig(), failOnly);

      expect(guarded.classify('Olá')).toEqual({
        state: 'Failed',
        reason: 'invalid router transition Start -> Classified',
      });
    });

    it('should end in Failed when the target state is not terminal', () => {
      const open = new RouterStateMachine({ Start: ['Classified', 'Failed'], Classified: ['Failed'], Failed: [] });
      const guarded = new IntentRouter(builtInRoutingConfig(), open);

      expect(guarded.classify('Olá')).toEqual({
        state: 'Failed',
        reason: 'invalid router transition Start -> Classified',
      });
    });

    it('should record one Start -> terminal step per call', () => {
      const fsm = new RouterStateMachine();
      const spy = jest.spyOn(fsm, 'transition');
      const tracked = new IntentRouter(builtInRoutingConfig(), fsm);

      tracked.classify('Olá', 'req-7');
      tracked.classify('', 'req-8');

      expect(spy.mock.calls).toEqual([
        ['req-7', 'Start', 'Classified', 'Greeting'],
        ['req-8', 'Start', 'Failed', 'message must be a non-empty string'],
      ]);
    });
  });

  it('should be deterministic', () => {
    const message = 'Quais tags e segmentos tem o contato ana@example.com?';
    expect(router.classify(message)).toEqual(router.classify(message));
  });

  it('should work with the built-in patterns', () => {
    const builtIn = new IntentRouter();
    expect(decisionOf(builtIn.classify('Olá')).category).toBe('Greeting');
    expect(decisionOf(builtIn.classify('lead score for ana@example.com')).category).toBe('DomainQuery');
  });
});
