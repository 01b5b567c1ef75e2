import * as fs from 'fs';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { RoutingConfig, TieBreakPolicy } from './types';
import { logger } from '../observability/logger';

/** Shape of config/routing.yaml; every key is optional and falls back to the built-in default */
interface RoutingFile {
  greetingPatterns?: string[];
  domainSignals?: { crm?: string[]; marketing?: string[] };
  minConfidence?: number;
  tieBreak?: TieBreakPolicy;
  maxMessageLength?: number;
}

const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };

const routingFileSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    greetingPatterns: stringList,
    domainSignals: {
      type: 'object',
      additionalProperties: false,
      properties: { crm: stringList, marketing: stringList },
    },
    minConfidence: { type: 'number', minimum: 0, maximum: 1 },
    tieBreak: { type: 'string', enum: ['domain', 'greeting'] },
    maxMessageLength: { type: 'integer', minimum: 1 },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateRoutingFile = ajv.compile<RoutingFile>(routingFileSchema);

/** Minimal pattern set used when no routing file is available */
export function builtInRoutingConfig(): RoutingConfig {
  return {
    greetingPatterns: ['ola', 'oi', 'bom dia', 'boa tarde', 'boa noite', 'hello', 'hi', 'hey'],
    domainSignals: {
      crm: ['vtiger', 'crm', 'contato', 'contact', 'lead', 'score'],
      marketing: ['mautic', 'campanha', 'campaign', 'segmento', 'segment', 'tag'],
    },
    minConfidence: 0.5,
    tieBreak: 'domain',
    maxMessageLength: 4000,
  };
}

export function mergeRoutingConfig(base: RoutingConfig, file: RoutingFile): RoutingConfig {
  return {
    greetingPatterns: file.greetingPatterns ?? base.greetingPatterns,
    domainSignals: {
      crm: file.domainSignals?.crm ?? base.domainSignals.crm,
      marketing: file.domainSignals?.marketing ?? base.domainSignals.marketing,
    },
    minConfidence: file.minConfidence ?? base.minConfidence,
    tieBreak: file.tieBreak ?? base.tieBreak,
    maxMessageLength: file.maxMessageLength ?? base.maxMessageLength,
  };
}

/**
 * Load routing patterns from a YAML file.
 * A missing, unreadable or invalid file logs and yields the built-in default.
 */
export function loadRoutingConfig(filePath: string): RoutingConfig {
  const defaults = builtInRoutingConfig();
  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Routing config not found; using built-in patterns');
    return defaults;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    logger.error({ err, filePath }, 'Failed to parse routing config');
    return defaults;
  }

  if (!validateRoutingFile(parsed)) {
    logger.error({ filePath, errors: ajv.errorsText(validateRoutingFile.errors) }, 'Invalid routing config');
    return defaults;
  }

  const config = mergeRoutingConfig(defaults, parsed);
  logger.info(
    {
      filePath,
      greetingPatterns: config.greetingPatterns.length,
      crmSignals: config.domainSignals.crm.length,
      marketingSignals: config.domainSignals.marketing.length,
      tieBreak: config.tieBreak,
    },
    'Routing config loaded',
  );
  return config;
}
