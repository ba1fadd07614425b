import { createDeploymentContext, DeploymentContextInput } from '../src/context';
import { deriveSettings } from '../src/derivation';
import { parseParameters } from '../src/parameters';

export const SUBSCRIPTION_ID = '00000000-0000-0000-0000-000000000001';
export const OTHER_SUBSCRIPTION_ID = '00000000-0000-0000-0000-000000000002';
export const TENANT_ID = '00000000-0000-0000-0000-0000000000aa';
export const USER_PRINCIPAL_ID = '11111111-2222-3333-4444-555555555555';

export const makeContext = (overrides: Partial<DeploymentContextInput> = {}) =>
  createDeploymentContext({
    environmentName: 'demo1',
    location: 'eastus',
    subscriptionId: SUBSCRIPTION_ID,
    tenantId: TENANT_ID,
    resourceGroupName: 'rg-demo1',
    ...overrides,
  });

export const makeParams = (
  raw: Record<string, string | undefined> = {},
  options: { hasExistingAiKey?: boolean } = {},
) => parseParameters({ environmentName: 'demo1', location: 'eastus', ...raw }, options);

export const makeDerived = (
  raw: Record<string, string | undefined> = {},
  options: { hasExistingAiKey?: boolean } = {},
) => deriveSettings(makeContext(), makeParams(raw, options));
