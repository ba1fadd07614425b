import { NamedResourceKind } from '../types';

export const abbreviations: Record<NamedResourceKind, string> = {
  aiServices: 'cog-',
  storageAccount: 'st',
  appServicePlan: 'plan-',
  appService: 'app-',
  logAnalytics: 'log-',
  applicationInsights: 'appi-',
  keyVault: 'kv-',
  searchService: 'srch-',
};

export const resourceGroupPrefix = 'rg-';
