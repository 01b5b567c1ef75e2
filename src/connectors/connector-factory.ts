import { ConnectorSet, CrmConnector, MarketingConnector } from './types';
import { VtigerConnector } from './vtiger-connector';
import { MauticConnector } from './mautic-connector';
import { createMockConnectors } from './mock-connectors';
import { logger } from '../observability/logger';

interface ConnectorEnv {
  vtiger: { baseUrl: string; username: string; accessKey: string };
  mautic: { baseUrl: string; username: string; password: string };
}

/**
 * Build the CRM + marketing connectors from environment configuration.
 * A system without credentials falls back to its in-memory mock.
 */
export function buildConnectors(envConfig: ConnectorEnv): ConnectorSet {
  const log = logger.child({ component: 'connector-factory' });
  const mocks = createMockConnectors();

  let crm: CrmConnector;
  if (envConfig.vtiger.baseUrl && envConfig.vtiger.username && envConfig.vtiger.accessKey) {
    crm = new VtigerConnector(envConfig.vtiger);
    log.info({ baseUrl: envConfig.vtiger.baseUrl }, 'Vtiger CRM connector initialized');
  } else {
    crm = mocks.crm;
    log.warn('Vtiger credentials not set; using mock CRM connector');
  }

  let marketing: MarketingConnector;
  if (envConfig.mautic.baseUrl && envConfig.mautic.username && envConfig.mautic.password) {
    marketing = new MauticConnector(envConfig.mautic);
    log.info({ baseUrl: envConfig.mautic.baseUrl }, 'Mautic connector initialized');
  } else {
    marketing = mocks.marketing;
    log.warn('Mautic credentials not set; using mock marketing connector');
  }

  return { crm, marketing };
}
